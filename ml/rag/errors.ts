export type PolicyQaErrorKind =
  | "CHUNKING_ERROR"
  | "EXTRACTION_ERROR"
  | "EMBEDDING_SERVICE_ERROR"
  | "GENERATION_SERVICE_ERROR"
  | "INDEX_UNAVAILABLE"
  | "INDEX_DIMENSION_MISMATCH"
  | "NOT_FOUND"
  | "INTERNAL";

export type PolicyQaErrorPayload = {
  kind: PolicyQaErrorKind;
  stage: string;
  message: string;
  timed_out: boolean;
  context: Record<string, string | number | boolean | null>;
  cause?: string;
};

type ErrorParams = {
  stage: string;
  reason: string;
  context?: PolicyQaErrorPayload["context"];
  cause?: unknown;
  timed_out?: boolean;
};

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return String(cause);
}

export class PolicyQaError extends Error {
  readonly kind: PolicyQaErrorKind;
  readonly stage: string;
  readonly context: PolicyQaErrorPayload["context"];
  readonly timed_out: boolean;

  constructor(kind: PolicyQaErrorKind, params: ErrorParams) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "PolicyQaError";
    this.kind = kind;
    this.stage = params.stage;
    this.context = params.context ?? {};
    this.timed_out = params.timed_out ?? false;
  }

  toPayload(): PolicyQaErrorPayload {
    const cause = describeCause(this.cause);
    return {
      kind: this.kind,
      stage: this.stage,
      message: this.message,
      timed_out: this.timed_out,
      context: this.context,
      ...(cause ? { cause } : {}),
    };
  }
}

export class ChunkingError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("CHUNKING_ERROR", params);
    this.name = "ChunkingError";
  }
}

export class ExtractionError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("EXTRACTION_ERROR", params);
    this.name = "ExtractionError";
  }
}

export class EmbeddingServiceError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("EMBEDDING_SERVICE_ERROR", params);
    this.name = "EmbeddingServiceError";
  }
}

export class GenerationServiceError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("GENERATION_SERVICE_ERROR", params);
    this.name = "GenerationServiceError";
  }
}

export class IndexUnavailableError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("INDEX_UNAVAILABLE", params);
    this.name = "IndexUnavailableError";
  }
}

export class IndexDimensionError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("INDEX_DIMENSION_MISMATCH", params);
    this.name = "IndexDimensionError";
  }
}

export class NotFoundError extends PolicyQaError {
  constructor(params: ErrorParams) {
    super("NOT_FOUND", params);
    this.name = "NotFoundError";
  }
}

export function toErrorPayload(
  error: unknown,
  stage: string,
  context: PolicyQaErrorPayload["context"] = {}
): PolicyQaErrorPayload {
  if (error instanceof PolicyQaError) {
    return error.toPayload();
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    kind: "INTERNAL",
    stage,
    message,
    timed_out: false,
    context,
  };
}

/**
 * Race an external call against a deadline. The timer is always cleared so a
 * settled call never keeps the process alive.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => PolicyQaError
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
