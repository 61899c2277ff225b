export class HttpError extends Error {
  statusCode: number;

  /**
   * Public-facing error message. Safe to return to clients.
   */
  override message: string;

  /** Machine-readable error code, e.g. `Overlap` or `InvalidTransition`. */
  code?: string;

  constructor(statusCode: number, publicMessage: string, opts?: { code?: string; cause?: unknown }) {
    super(publicMessage, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.message = publicMessage;
    this.code = opts?.code;
  }
}
