import { FieldType } from "../types/ingest";
import { EMAIL_PATTERN, parseBooleanString, parseIsoDatetime } from "./typeCoercion";

const PLAIN_NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;
const PHONE_PATTERN = /^\+?\d[\d\s\-().]{6,}$/;
const PHONE_NAME_WORDS = new Set([
  "phone",
  "phones",
  "telephone",
  "tel",
  "telefono",
  "mobile",
  "movil",
  "celular",
  "cell",
  "cellphone",
  "whatsapp",
  "fono",
]);

// "contactPhone" / "phone_2" / "mobile-number" → ["contact", "phone"] / ["phone", "2"] / ["mobile", "number"]
function nameWords(fieldName: string): string[] {
  return fieldName
    .replace(/([a-z\d])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z\d]+/)
    .filter((word) => word.length > 0);
}

function looksLikePhoneName(fieldName: string): boolean {
  return nameWords(fieldName).some((word) => PHONE_NAME_WORDS.has(word));
}

/**
 * Pick a field type for a previously unseen payload key from one sample value.
 *
 * Precedence: boolean → number → email → datetime → phone → string.
 * Numeric strings only match plain decimals without a leading "+", so
 * "+15551234567" falls through to phone when the key looks like a phone field.
 */
export function inferFieldType(fieldName: string, sample: unknown): FieldType {
  if (typeof sample === "boolean") return "boolean";
  if (typeof sample === "number") return "number";
  if (typeof sample !== "string") return "string";

  const value = sample.trim();
  if (!value) return "string";

  if (parseBooleanString(value) !== null) return "boolean";
  if (PLAIN_NUMBER_PATTERN.test(value)) return "number";
  if (EMAIL_PATTERN.test(value)) return "email";
  if (parseIsoDatetime(value) !== null) return "datetime";
  if (looksLikePhoneName(fieldName) && PHONE_PATTERN.test(value)) return "phone";

  return "string";
}
