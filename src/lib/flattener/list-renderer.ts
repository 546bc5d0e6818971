/**
 * List leaf rendering
 *
 * List values are not decomposed into columns. They are stored as text in the
 * list-literal form downstream consumers already parse: `['10', '11']`,
 * `[1, True, None]`, `[{'k': 'v'}]`. The text is not JSON.
 */

import type { NestedValue } from "../../types/data-model.js";

const ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

function escapeControl(char: string): string {
  const code = char.charCodeAt(0);
  if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) {
    return `\\x${code.toString(16).padStart(2, "0")}`;
  }
  return char;
}

/**
 * Exponents always carry at least two digits: `1e-07`, `1e+21`
 */
export function renderNumber(value: number): string {
  return String(value).replace(
    /e([+-])(\d)$/,
    (_match, sign: string, digit: string) => `e${sign}0${digit}`,
  );
}

/**
 * Quote a string, preferring single quotes unless only double quotes avoid escaping
 */
export function renderString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let body = "";
  for (const char of value) {
    if (char === quote) {
      body += `\\${char}`;
    } else {
      body += ESCAPES[char] ?? escapeControl(char);
    }
  }
  return `${quote}${body}${quote}`;
}

export function renderValue(value: NestedValue): string {
  if (value === null) {
    return "None";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "number") {
    return renderNumber(value);
  }
  if (typeof value === "string") {
    return renderString(value);
  }
  if (Array.isArray(value)) {
    return renderList(value);
  }
  const entries = Object.entries(value).map(
    ([key, item]) => `${renderString(key)}: ${renderValue(item)}`,
  );
  return `{${entries.join(", ")}}`;
}

export function renderList(values: NestedValue[]): string {
  return `[${values.map(renderValue).join(", ")}]`;
}
