export type ChartErrorCode =
  | "UNKNOWN_BODY"
  | "UNKNOWN_SIGN"
  | "UNKNOWN_MANSION"
  | "INVALID_HOUSE"
  | "INVALID_REQUEST"
  | "INVALID_DATETIME"
  | "INVALID_TIMEZONE"
  | "INVALID_CONFIG"
  | "INVALID_DATA"
  | "EPHEMERIS_FAILURE";

export class ChartError extends Error {
  readonly code: ChartErrorCode;
  readonly details?: unknown;

  constructor(code: ChartErrorCode, message?: string, details?: unknown) {
    super(message ?? getErrorMessage(code));
    this.name = "ChartError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised at a catalog lookup site when a body, sign, mansion or house
 * identifier does not exist. Never defaulted.
 */
export class InvalidIdentifierError extends ChartError {
  readonly identifier: unknown;

  constructor(
    code: Extract<ChartErrorCode, "UNKNOWN_BODY" | "UNKNOWN_SIGN" | "UNKNOWN_MANSION" | "INVALID_HOUSE">,
    identifier: unknown,
  ) {
    super(code, `${getErrorMessage(code)} Received: ${String(identifier)}.`, { identifier });
    this.name = "InvalidIdentifierError";
    this.identifier = identifier;
  }
}

const defaultMessages: Record<ChartErrorCode, string> = {
  UNKNOWN_BODY: "Unknown body identifier.",
  UNKNOWN_SIGN: "Unknown sign identifier.",
  UNKNOWN_MANSION: "Unknown lunar mansion index.",
  INVALID_HOUSE: "House number must be an integer between 1 and 12.",
  INVALID_REQUEST: "Invalid chart request payload.",
  INVALID_DATETIME: "Birth date or time could not be parsed.",
  INVALID_TIMEZONE: "Timezone could not be resolved.",
  INVALID_CONFIG: "Invalid chart configuration.",
  INVALID_DATA: "Reference data file failed validation.",
  EPHEMERIS_FAILURE: "Ephemeris provider failed to supply a position.",
};

const clientErrorCodes: ReadonlySet<ChartErrorCode> = new Set([
  "UNKNOWN_BODY",
  "UNKNOWN_SIGN",
  "UNKNOWN_MANSION",
  "INVALID_HOUSE",
  "INVALID_REQUEST",
  "INVALID_DATETIME",
  "INVALID_TIMEZONE",
]);

export function getErrorMessage(code: ChartErrorCode): string {
  return defaultMessages[code] ?? "Unexpected chart error.";
}

export interface ErrorPayload {
  status: number;
  body: {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  };
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof ChartError) {
    return {
      status: clientErrorCodes.has(error.code) ? 400 : 500,
      body: {
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal server error.",
      },
    },
  };
}
