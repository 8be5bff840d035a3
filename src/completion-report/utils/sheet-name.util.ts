import { FALLBACK_SHEET_NAME, MAX_SHEET_NAME_LENGTH } from '../completion-report.constants';

/** Excel: solo A-Z, a-z, 0-9 y máximo 31 caracteres */
export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9]/g, '').slice(0, MAX_SHEET_NAME_LENGTH);
  return cleaned || FALLBACK_SHEET_NAME;
}

/** Agrega sufijo numérico si el nombre ya existe en el libro (Excel no admite repetidos) */
export function uniqueSheetName(name: string, taken: ReadonlySet<string>): string {
  const lower = new Set([...taken].map((n) => n.toLowerCase()));
  if (!lower.has(name.toLowerCase())) return name;

  for (let i = 1; ; i++) {
    const suffix = String(i);
    const candidate = name.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
    if (!lower.has(candidate.toLowerCase())) return candidate;
  }
}
