import { IncomingHttpHeaders } from 'http';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

/** Every request the downstream service received, in arrival order. */
class RequestLog {
  private entries: RecordedRequest[] = [];

  record(entry: RecordedRequest): void {
    this.entries.push(entry);
  }

  count(): number {
    return this.entries.length;
  }

  last(): RecordedRequest | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  all(): RecordedRequest[] {
    return [...this.entries];
  }

  reset(): void {
    this.entries = [];
  }
}

export const requestLog = new RequestLog();
