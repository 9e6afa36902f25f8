import type { ContentfulStatusCode } from "hono/utils/http-status";

/** Base class for all air-quality pipeline errors. */
export class AirQualityError extends Error {
  constructor(
    message: string,
    public readonly statusCode: ContentfulStatusCode = 500,
    public readonly code: string = "INTERNAL_ERROR",
  ) {
    super(message);
    this.name = "AirQualityError";
  }
}

export class NotFoundError extends AirQualityError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AirQualityError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class AdapterError extends AirQualityError {
  constructor(adapterId: string, message: string) {
    super(`[${adapterId}] ${message}`, 502, "ADAPTER_ERROR");
    this.name = "AdapterError";
  }
}

/** A (pollutant, year) scope has no reconciled hourly rows to derive from. */
export class NoDataError extends AirQualityError {
  constructor(pollutantCode: string, year: number) {
    super(`No hourly data for pollutant '${pollutantCode}' in ${year}`, 404, "NO_DATA");
    this.name = "NoDataError";
  }
}

export class BreakpointTableError extends AirQualityError {
  constructor(message: string) {
    super(message, 422, "BREAKPOINT_TABLE");
    this.name = "BreakpointTableError";
  }
}
