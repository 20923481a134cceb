/** Raised only when the caller asked for an unreadable root to be fatal. */
export class RootUnreadableError extends Error {
  readonly path: string;
  readonly code: string;

  constructor(path: string, cause: unknown) {
    const code = errorCode(cause);
    super(`cannot read ${path} (${code})`, { cause });
    this.name = "RootUnreadableError";
    this.path = path;
    this.code = code;
  }
}

/** errno code of a filesystem error, or "UNKNOWN". */
export function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "UNKNOWN";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Exhaustiveness guard for switches over `Entry["kind"]`. */
export function assertNever(value: never): never {
  throw new Error(`unexpected entry: ${JSON.stringify(value)}`);
}
