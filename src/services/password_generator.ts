// Initial password generation for lab accounts

import { randomInt } from "node:crypto";
import { LabError } from "../models/errors.ts";

export const MIN_PASSWORD_LENGTH = 1;
export const MAX_PASSWORD_LENGTH = 100;
export const DEFAULT_PASSWORD_LENGTH = 16;

const EXCLUDED = new Set(['"', "'", "#"]);

// Printable ASCII from "!" (0x21) to "~" (0x7e), minus quotes and hash
export const PASSWORD_ALPHABET = Array.from({ length: 0x7e - 0x21 + 1 }, (_, i) => String.fromCharCode(0x21 + i))
  .filter((ch) => !EXCLUDED.has(ch))
  .join("");

export function generatePassword(length: number = DEFAULT_PASSWORD_LENGTH): string {
  if (!Number.isInteger(length) || length < MIN_PASSWORD_LENGTH || length > MAX_PASSWORD_LENGTH) {
    throw new LabError(
      "InvalidArgument",
      `Password length must be between ${MIN_PASSWORD_LENGTH} and ${MAX_PASSWORD_LENGTH}, got ${length}`,
    );
  }

  let password = "";
  for (let i = 0; i < length; i++) {
    password += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return password;
}
