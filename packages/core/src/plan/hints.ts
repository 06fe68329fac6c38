import type { RequestHints } from "./types.js";

/** Ids longer than 15 digits are ignored; they would not survive as numbers. */
const CUSTOMER_ID_PATTERN = /(?:customer\s*id|customer|id)\s*[:#]?\s*(\d{1,15})(?!\d)/i;
const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

/** Pulls a customer id and a contact address out of free text. Either may be null. */
export function extractHints(text: string): RequestHints {
  const idMatch = CUSTOMER_ID_PATTERN.exec(text);
  const emailMatch = EMAIL_PATTERN.exec(text);
  return {
    customerId: idMatch ? Number(idMatch[1]) : null,
    email: emailMatch ? emailMatch[0] : null,
  };
}
