import { DownloadResponse } from './dialogue-response';

/** Records what a controller writes to the response. */
export class FakeDownloadResponse implements DownloadResponse {
  writableEnded = false;
  statusCode?: number;
  body?: Buffer;
  readonly headers: Record<string, string> = {};
  private readonly closeListeners: Array<() => void> = [];

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  status(code: number) {
    this.statusCode = code;
    return {
      end: (chunk: Buffer) => {
        this.body = chunk;
        this.writableEnded = true;
      },
    };
  }

  on(_event: 'close', listener: () => void): void {
    this.closeListeners.push(listener);
  }

  close(): void {
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}
