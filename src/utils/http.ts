// src/utils/http.ts

export function parseJsonOrText(raw: string): unknown {
  if (raw === '') return null;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toHeaderRecord(headers: object): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[key.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      record[key.toLowerCase()] = String(value);
    }
  }
  return record;
}
