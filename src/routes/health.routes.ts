import { Router } from 'express';
import { httpLogger as logger } from '../core/logger';

const router = Router();

// Basic health check
router.get('/', (req, res) => {
  logger.debug({ req: { id: req.id } }, 'Health check requested');
  res.json({
    success: true,
    data: {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    }
  });
});

export { router as healthRoutes };
