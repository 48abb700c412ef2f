import { isAxiosError } from "axios";

export class SourceSystemError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = "SourceSystemError";
  }
}

export class DuplicateSourceError extends SourceSystemError {
  constructor(sourceId: string) {
    super(`Source "${sourceId}" appears more than once in the cascade.`, "SOURCE_DUPLICATE_ID");
    this.name = "DuplicateSourceError";
  }
}

export class SourceRequestError extends SourceSystemError {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly isNetworkError: boolean,
    public readonly systemCode: string | null
  ) {
    super(message, "SOURCE_REQUEST_FAILED");
    this.name = "SourceRequestError";
  }
}

export const toSourceRequestError = (error: unknown): SourceRequestError => {
  if (isAxiosError(error)) {
    return new SourceRequestError(
      error.message,
      error.response?.status ?? null,
      !error.response,
      error.code ?? null
    );
  }

  if (error instanceof SourceRequestError) {
    return error;
  }

  if (error instanceof Error) {
    const systemCode = "code" in error && typeof error.code === "string" ? error.code : null;
    return new SourceRequestError(error.message, null, false, systemCode);
  }

  return new SourceRequestError(
    "An unknown source request error occurred.",
    null,
    false,
    null
  );
};
