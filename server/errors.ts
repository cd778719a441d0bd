export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message };
  }
}

// None of the candidate encodings produced a readable delimited table
export class DecodeError extends HttpError {
  constructor(
    public readonly table: string,
    reason: string,
  ) {
    super(400, `CSV read error: ${reason}`);
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, table: this.table };
  }
}

// A join-key column is absent after header normalization
export class MissingColumnError extends HttpError {
  constructor(
    public readonly table: string,
    public readonly column: string,
    public readonly available: readonly string[],
  ) {
    super(400, `Missing column '${column}' in ${table}. Available: ${available.join(", ")}`);
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, table: this.table, column: this.column, available: [...this.available] };
  }
}
