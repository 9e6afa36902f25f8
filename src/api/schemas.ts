import { z } from "@hono/zod-openapi";
import { TABLE_MODES } from "../pipeline/breakpoints";
import { DATA_SOURCES } from "../pipeline/observation";

// ---------------------------------------------------------------------------
// Shared schemas — used by core and adapter routes
// ---------------------------------------------------------------------------

/** Standard error response. */
export const ErrorSchema = z
  .object({
    error: z.string().openapi({ description: "Error message" }),
    code: z.string().optional().openapi({ description: "Machine-readable error code", example: "NOT_FOUND" }),
    details: z.string().optional().openapi({ description: "Additional error details" }),
  })
  .openapi("Error");

/** Pagination metadata. */
export const PaginationSchema = z
  .object({
    total: z.number().openapi({ description: "Total number of results" }),
    limit: z.number().openapi({ description: "Results per page limit" }),
    offset: z.number().openapi({ description: "Current offset" }),
    hasMore: z.boolean().openapi({ description: "Whether more results exist" }),
  })
  .openapi("Pagination");

export const DataSourceSchema = z.enum(["PRIMARY", "SECONDARY"]).openapi({
  description: `Feed that supplied the value (${DATA_SOURCES.join(" or ")})`,
  example: "PRIMARY",
});

export const TableModeSchema = z.enum(TABLE_MODES).openapi({
  description: "Breakpoint table mode; 'auto' picks by today's date against the cutover",
  example: "auto",
});

/** Site identity — used in nested models. */
export const SiteKeySchema = z
  .object({
    id: z.string().openapi({ description: "State-county-site identifier", example: "37-063-0015" }),
    stateCode: z.string().openapi({ example: "37" }),
    countyCode: z.string().openapi({ example: "063" }),
    siteNumber: z.string().openapi({ example: "0015" }),
  })
  .openapi("SiteKey");

// ---------------------------------------------------------------------------
// Query parameter helpers
// ---------------------------------------------------------------------------

export const limitParam = z.coerce.number().int().min(1).max(1000).default(100).openapi({
  param: { name: "limit", in: "query" },
  description: "Maximum number of results",
  example: 100,
});

export const offsetParam = z.coerce.number().int().min(0).default(0).openapi({
  param: { name: "offset", in: "query" },
  description: "Pagination offset",
  example: 0,
});

export const siteParam = z
  .string()
  .regex(/^[^-]+-[^-]+-[^-]+$/, "expected state-county-site, e.g. 37-063-0015")
  .optional()
  .openapi({
    param: { name: "site", in: "query" },
    description: "Filter by site (state-county-site)",
    example: "37-063-0015",
  });

export const pollutantParam = z.string().min(1).optional().openapi({
  param: { name: "pollutant", in: "query" },
  description: "Filter by pollutant (AQS parameter code)",
  example: "88101",
});

export const yearParam = z.coerce.number().int().min(1980).max(2100).openapi({
  param: { name: "year", in: "query" },
  description: "Calendar year",
  example: 2024,
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const fromDateParam = isoDate.optional().openapi({
  param: { name: "from", in: "query" },
  description: "First local date to include (YYYY-MM-DD)",
  example: "2024-06-01",
});

export const toDateParam = isoDate.optional().openapi({
  param: { name: "to", in: "query" },
  description: "Last local date to include (YYYY-MM-DD)",
  example: "2024-06-30",
});

export function paginate(total: number, limit: number, offset: number, returned: number) {
  return { total, limit, offset, hasMore: offset + returned < total };
}
