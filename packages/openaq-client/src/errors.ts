export class UpstreamRequestError extends Error {
  /** `0` when no response arrived. */
  readonly status: number;
  readonly url: string;
  readonly method: string;
  readonly responseBody?: string;

  constructor(options: { method: string; url: string; status: number; body?: string; message?: string }) {
    const baseMessage =
      options.message ?? `Request to ${options.method.toUpperCase()} ${options.url} failed with status ${options.status}`;
    super(baseMessage);
    this.name = 'UpstreamRequestError';
    this.status = options.status;
    this.url = options.url;
    this.method = options.method.toUpperCase();
    this.responseBody = options.body;
  }
}
