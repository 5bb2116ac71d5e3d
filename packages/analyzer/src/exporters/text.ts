import { writeFile } from 'fs/promises';
import { format } from 'date-fns';

export const RUN_TIMESTAMP_FORMAT = 'yyyyMMdd_HHmmss';

export function runTimestamp(date: Date): string {
  return format(date, RUN_TIMESTAMP_FORMAT);
}

export function generatedOn(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

/** Newline-terminated lines; fails if the file already exists */
export async function writeLines(filePath: string, lines: string[]): Promise<void> {
  const body = lines.length > 0 ? lines.join('\n') + '\n' : '';
  await writeFile(filePath, body, { encoding: 'utf-8', flag: 'wx' });
}

export function rule(char: string, width: number): string {
  return char.repeat(width);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Date part of an ISO timestamp */
export function dateOnly(iso: string | null): string {
  return iso ? iso.split('T')[0] : 'N/A';
}
