import { CellValue } from '../types';

/**
 * Prints a decimal the way a float is usually shown in data tools:
 * shortest round-trip digits, always a fractional part (`400.0`), and
 * exponent notation below 1e-4 or from 1e16 on (`1e-07`, `1.5e+16`).
 */
export function formatDecimal(value: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  if (value === 0) {
    return Object.is(value, -0) ? '-0.0' : '0.0';
  }

  const [mantissa, exponentText] = value.toExponential().split('e');
  const exponent = Number(exponentText);
  if (exponent < -4 || exponent >= 16) {
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${mantissa}e${exponent < 0 ? '-' : '+'}${digits}`;
  }

  const fixed = String(value);
  return fixed.includes('.') ? fixed : `${fixed}.0`;
}

export function formatCell(cell: CellValue): string {
  switch (cell.kind) {
    case 'integer':
      return String(cell.value);
    case 'decimal':
      return formatDecimal(cell.value);
    case 'text':
      return cell.value;
    case 'empty':
      return '';
  }
}

/**
 * Turns a raw column name into a table label:
 * `amount_purchased` → `Amount Purchased`.
 * Every run of letters is capitalised, the rest of the run lower-cased.
 */
export function formatColumnHeader(header: string): string {
  return header
    .replace(/_/g, ' ')
    .replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}
