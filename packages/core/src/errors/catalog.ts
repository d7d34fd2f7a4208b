/**
 * Typed error catalog. Fatal errors carry the process exit status the CLI
 * terminates with; recoverable ones are logged and recorded as diagnostics.
 */

export class PrefixListToolError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly exitCode: number,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        exitCode: this.exitCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Fatal

export class ConfigurationError extends PrefixListToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, 2, details);
  }
}

export class SetupError extends PrefixListToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SETUP_ERROR", message, 1, details);
  }
}

/** No prefix list survived ownership and name filtering. */
export class NoPrefixListsError extends PrefixListToolError {
  constructor(details?: Record<string, unknown>) {
    super(
      "NO_PREFIX_LISTS",
      "No prefix lists found matching criteria",
      3,
      details,
    );
  }
}

// Recoverable

export class EntryFetchError extends PrefixListToolError {
  constructor(listId: string, cause: string) {
    super(
      "ENTRY_FETCH_FAILED",
      `Error retrieving entries for ${listId}: ${cause}`,
      1,
      { listId },
    );
  }
}

export class InvalidCidrError extends PrefixListToolError {
  constructor(block: string) {
    super("INVALID_CIDR", `Invalid CIDR format: ${block}`, 1, { block });
  }
}

export class ReportWriteError extends PrefixListToolError {
  constructor(path: string, cause: string) {
    super(
      "REPORT_WRITE_FAILED",
      `Failed to write CSV report ${path}: ${cause}`,
      1,
      { path },
    );
  }
}
