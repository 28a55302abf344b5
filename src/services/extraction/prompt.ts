import { DEED_FIELDS } from '../../domain/schemas.js';

export const SYSTEM_PROMPT = [
  'You extract structured data from recorded property deeds.',
  'You do NOT fix errors.',
  'You do NOT infer missing values.',
  'You ONLY return a JSON object with the requested fields.',
].join('\n');

const FIELD_HINTS: Partial<Record<(typeof DEED_FIELDS)[number], string>> = {
  date_signed: 'YYYY-MM-DD',
  date_recorded: 'YYYY-MM-DD',
  grantee: 'all grantee names as one string, as written',
  amount_numeric: 'number, no currency symbols or separators',
  amount_text: 'the written-out amount, as written',
  status: 'PRELIMINARY, RECORDED, RELEASED or VOID',
};

export function buildUserPrompt(rawText: string): string {
  const fields = DEED_FIELDS.map((field) => {
    const hint = FIELD_HINTS[field];
    return hint ? `${field} (${hint})` : field;
  }).join('\n');

  return `Extract the following deed text into a JSON object with these exact fields:\n\n${fields}\n\nText:\n${rawText}`;
}
