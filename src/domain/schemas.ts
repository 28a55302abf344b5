import { z } from 'zod';
import { parseCalendarDate } from './dates.js';
import { decimalToCents } from './money.js';
import { DEED_STATUSES } from './types.js';

/** Wire names of every field a candidate record must carry, in check order. */
export const DEED_FIELDS = [
  'document_type',
  'document_id',
  'county_raw',
  'state',
  'date_signed',
  'date_recorded',
  'grantor',
  'grantee',
  'amount_numeric',
  'amount_text',
  'apn',
  'status',
] as const;

export type DeedField = (typeof DEED_FIELDS)[number];

const nonBlank = z.string().refine((value) => value.trim().length > 0, 'must not be blank');

const calendarDate = z.string().transform((value, ctx) => {
  const parsed = parseCalendarDate(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a date as YYYY-MM-DD or MM/DD/YYYY, got '${value}'`,
    });
    return z.NEVER;
  }
  return parsed;
});

const amountCents = z.unknown().transform((value, ctx) => {
  if (typeof value !== 'number' && typeof value !== 'string') {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a number or decimal string, received ${value === null ? 'null' : typeof value}`,
    });
    return z.NEVER;
  }

  const cents = decimalToCents(value);
  if (cents === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a non-negative decimal with at most 2 fraction digits, got '${String(value)}'`,
    });
    return z.NEVER;
  }
  return cents;
});

export const candidateDeedSchema = z
  .object({
    document_type: nonBlank,
    document_id: nonBlank,
    county_raw: nonBlank,
    state: z.string().regex(/^[A-Z]{2}$/, 'expected a two-letter uppercase state code'),
    date_signed: calendarDate,
    date_recorded: calendarDate,
    grantor: nonBlank,
    grantee: nonBlank,
    amount_numeric: amountCents,
    amount_text: nonBlank,
    apn: nonBlank,
    status: z.enum(DEED_STATUSES),
  })
  .transform((raw) => ({
    documentType: raw.document_type,
    documentId: raw.document_id,
    countyRaw: raw.county_raw,
    state: raw.state,
    dateSigned: raw.date_signed,
    dateRecorded: raw.date_recorded,
    grantor: raw.grantor,
    grantee: raw.grantee,
    amountCents: raw.amount_numeric,
    amountText: raw.amount_text,
    apn: raw.apn,
    status: raw.status,
  }));

const taxRate = z.union([
  z.number().nonnegative(),
  z.string().regex(/^\d+(?:\.\d+)?$/, 'expected a non-negative decimal string').transform(Number),
]);

export const countyCatalogFileSchema = z
  .array(
    z.object({
      canonical_name: nonBlank,
      tax_rate: taxRate,
    }),
  )
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.canonical_name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'canonical_name'],
          message: `duplicate canonical_name '${entry.canonical_name}'`,
        });
      }
      seen.add(entry.canonical_name);
    });
  });

export const validateDeedInput = z.object({
  record: z.record(z.string(), z.unknown()),
});

export const processDocumentInput = z.object({
  text: z.string().min(1, 'Document text is required'),
});

export type ValidateDeedInput = z.infer<typeof validateDeedInput>;
export type ProcessDocumentInput = z.infer<typeof processDocumentInput>;
export type CountyCatalogFile = z.infer<typeof countyCatalogFileSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}
