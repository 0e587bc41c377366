export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fetch failure: connection error, timeout, non-2xx status or unreadable body. */
export class NetworkError extends HarvestError {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, opts: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.url = opts.url;
    this.status = opts.status ?? null;
  }
}

/** Expected markup is missing or malformed. */
export class ParseError extends HarvestError {
  readonly url: string | null;

  constructor(message: string, opts: { url?: string; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.url = opts.url ?? null;
  }
}

export class ValidationError extends HarvestError {
  readonly value: string;

  constructor(message: string, value: string) {
    super(message);
    this.value = value;
  }
}

/** The directory page has a different number of mailto links than faculty blocks. */
export class ConsistencyError extends HarvestError {
  readonly emails: number;
  readonly names: number;

  constructor(emails: number, names: number) {
    super(`directory lists ${emails} distinct email(s) for ${names} faculty block(s)`);
    this.emails = emails;
    this.names = names;
  }
}

export class ConfigError extends HarvestError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
