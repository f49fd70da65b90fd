import axios, { AxiosInstance } from 'axios';

import { LEDGER_SOURCE_CONFIG } from '../../config/environments';
import { createServiceLogger } from '../../observability';

import {
  IncomingTransfer,
  LedgerFetchResult,
  LedgerPosition,
  LedgerSource,
  LedgerSourceError,
  RejectedRecord,
} from './ledger.source';
import {
  parseTonCenterTransaction,
  readRecordHeader,
  RecordHeader,
  TransferParseError,
} from './transfer.parser';

const log = createServiceLogger('toncenter');

export type TonCenterOptions = typeof LEDGER_SOURCE_CONFIG;

interface TonCenterResponse {
  ok: boolean;
  result?: unknown;
  error?: string;
}

interface PageCursor {
  lt: string;
  hash: string;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * toncenter v2 HTTP API. Results come newest first, so a window is read by
 * paging backwards from the head until a record older than `since`.
 */
export class TonCenterLedgerSource implements LedgerSource {
  readonly name = 'toncenter';
  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly maxPages: number;

  constructor(options: TonCenterOptions = LEDGER_SOURCE_CONFIG, http?: AxiosInstance) {
    this.pageSize = options.pageSize;
    this.maxPages = options.maxPages;
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: options.apiKey ? { 'X-API-Key': options.apiKey } : {},
      });
  }

  async fetchTransfers(
    address: string,
    since: Date,
    before: Pick<LedgerPosition, 'txId' | 'lt'> | null = null
  ): Promise<LedgerFetchResult> {
    const transfers: IncomingTransfer[] = [];
    const rejected: RejectedRecord[] = [];
    let latest: RecordHeader | null = null;
    let oldestRead: RecordHeader | null = null;
    let complete = false;
    let cursor: PageCursor | null = before ? { lt: before.lt, hash: before.txId } : null;

    for (let page = 0; page < this.maxPages; page++) {
      const records = await this.getPage(address, cursor);
      let oldest: RecordHeader | null = null;
      let reachedWindowStart = false;

      for (const raw of records) {
        let header: RecordHeader;
        try {
          header = readRecordHeader(raw);
        } catch (error) {
          rejected.push(this.reject(error));
          continue;
        }

        // Paging is inclusive of the cursor record
        if (cursor && header.txId === cursor.hash) {
          continue;
        }
        if (header.occurredAt.getTime() < since.getTime()) {
          reachedWindowStart = true;
          break;
        }

        latest = latest ?? header;
        oldest = header;
        oldestRead = header;

        try {
          const transfer = parseTonCenterTransaction(raw);
          if (transfer) {
            transfers.push(transfer);
          }
        } catch (error) {
          rejected.push(this.reject(error));
        }
      }

      if (reachedWindowStart || records.length < this.pageSize) {
        complete = true;
        break;
      }
      if (!oldest) {
        break;
      }
      cursor = { lt: oldest.lt, hash: oldest.txId };
    }

    if (rejected.length > 0) {
      log.warn({ address, rejected: rejected.length }, 'Rejected malformed ledger records');
    }
    if (!complete) {
      log.warn(
        { address, since, oldest: oldestRead?.occurredAt ?? null, pages: this.maxPages },
        'Page limit reached before the window start'
      );
    }

    transfers.sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime());
    return {
      transfers,
      rejected,
      latest: latest ? { txId: latest.txId, occurredAt: latest.occurredAt } : null,
      oldest: oldestRead
        ? { txId: oldestRead.txId, lt: oldestRead.lt, occurredAt: oldestRead.occurredAt }
        : null,
      complete,
    };
  }

  private async getPage(address: string, cursor: PageCursor | null): Promise<unknown[]> {
    let body: TonCenterResponse;
    try {
      const response = await this.http.get<TonCenterResponse>('/getTransactions', {
        params: {
          address,
          limit: this.pageSize,
          archival: true,
          ...(cursor ? { lt: cursor.lt, hash: cursor.hash } : {}),
        },
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new LedgerSourceError(
          `toncenter request failed: ${error.message}`,
          error.response?.status
        );
      }
      throw new LedgerSourceError(`toncenter request failed: ${errorMessage(error)}`);
    }

    if (!body.ok) {
      throw new LedgerSourceError(`toncenter error: ${body.error ?? 'unknown error'}`);
    }
    if (!Array.isArray(body.result)) {
      throw new LedgerSourceError('toncenter returned no transaction list');
    }
    return body.result;
  }

  private reject(error: unknown): RejectedRecord {
    if (error instanceof TransferParseError) {
      log.warn({ txId: error.txId, error: error.message }, 'Malformed ledger record');
      return { txId: error.txId, error: error.message };
    }
    throw error;
  }
}
