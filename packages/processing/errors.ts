// Raised when a raw source file cannot be retrieved. Always fatal at startup:
// without the raw file there is nothing to clean and no fallback to load.
export class FetchError extends Error {
  readonly url: string;
  readonly status: number | undefined;

  constructor(params: { url: string; message: string; status?: number; cause?: unknown }) {
    super(params.message, { cause: params.cause });
    this.name = "FetchError";
    this.url = params.url;
    this.status = params.status;
  }
}
