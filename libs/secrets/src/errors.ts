export class SecretStoreError extends Error {
  readonly status?: number;
  readonly errors: string[];

  constructor(message: string, options: { status?: number; errors?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SecretStoreError";
    this.status = options.status;
    this.errors = options.errors ?? [];
  }

  /** True when the store never answered (connection refused, DNS, timeout). */
  get isTransport(): boolean {
    return this.status === undefined;
  }
}
