import axios, { AxiosInstance } from 'axios';
import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import { FeedError } from '../core/errors';
import { feedLogger } from '../core/logger';
import { FeedRecord, FeedRecordSchema } from '../core/types';
import { describeHttpFailure } from '../marketplaces/http';

export interface FeedColumns {
  code: string;
  quantity: string;
  price: string;
}

export const DEFAULT_FEED_COLUMNS: FeedColumns = {
  code: 'Код',
  quantity: 'Количество',
  price: 'Цена',
};

export interface FeedParseOptions {
  // Zero-based row holding the column titles; the supplier sheet has a 17-row preamble
  headerRow?: number;
  columns?: FeedColumns;
}

const WORKBOOK_ENTRY = /\.xlsx?$/i;

/**
 * Download the supplier archive
 */
export async function downloadFeed(url: string, http: AxiosInstance = axios.create()): Promise<Buffer> {
  try {
    const response = await http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    const archive = Buffer.from(response.data);
    feedLogger.info({ url, bytes: archive.length }, 'Feed archive downloaded');
    return archive;
  } catch (error) {
    const { reason, httpStatus } = describeHttpFailure(error);
    throw new FeedError(`Failed to download feed: ${reason}`, { url, httpStatus });
  }
}

/**
 * Pull the stock workbook out of the supplier archive
 */
export async function unpackFeedWorkbook(archive: Buffer): Promise<Buffer> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(archive);
  } catch (error) {
    throw new FeedError(`Feed archive is not a readable zip: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries = Object.values(zip.files).filter((entry) => !entry.dir);
  const workbook = entries.find((entry) => WORKBOOK_ENTRY.test(entry.name));
  if (!workbook) {
    throw FeedError.missingWorkbook(entries.map((entry) => entry.name));
  }

  feedLogger.debug({ entry: workbook.name }, 'Feed workbook found');
  return workbook.async('nodebuffer');
}

/**
 * Read feed records from the first sheet of a workbook, in sheet order.
 * Cells are taken as displayed text; rows without a product code are skipped.
 */
export function parseFeedWorkbook(workbookBytes: Buffer, options: FeedParseOptions = {}): FeedRecord[] {
  const headerRow = options.headerRow ?? 17;
  const columns = options.columns ?? DEFAULT_FEED_COLUMNS;

  const workbook = XLSX.read(workbookBytes, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName !== undefined ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new FeedError('Feed workbook has no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range: headerRow,
    raw: false,
    defval: '',
    blankrows: false,
  });

  const [header = [], ...body] = rows;
  const titles = header.map((cell) => String(cell).trim());
  const indexOf = (title: string) => titles.indexOf(title);
  const codeIndex = indexOf(columns.code);
  const quantityIndex = indexOf(columns.quantity);
  const priceIndex = indexOf(columns.price);

  const missing = [columns.code, columns.quantity, columns.price].filter((title) => indexOf(title) === -1);
  if (missing.length > 0) {
    throw FeedError.missingColumns(missing);
  }

  const records: FeedRecord[] = [];
  for (const row of body) {
    const record = FeedRecordSchema.parse({
      code: String(row[codeIndex] ?? '').trim(),
      rawQuantity: row[quantityIndex] ?? '',
      rawPrice: row[priceIndex] ?? '',
    });
    if (record.code === '') {
      continue;
    }
    records.push(record);
  }

  feedLogger.info({ sheet: sheetName, records: records.length }, 'Feed parsed');
  return records;
}

export interface FeedLoaderOptions extends FeedParseOptions {
  url: string;
  http?: AxiosInstance;
}

/**
 * Download, unpack and parse the supplier feed
 */
export async function loadFeed(options: FeedLoaderOptions): Promise<FeedRecord[]> {
  const archive = await downloadFeed(options.url, options.http);
  const workbook = await unpackFeedWorkbook(archive);
  return parseFeedWorkbook(workbook, options);
}
