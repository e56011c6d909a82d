// src/utils/format.ts

import { randomBytes } from 'crypto';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

/**
 * Human-readable byte count, 1024-based: 1536 -> "1.5 KB"
 */
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) {
    throw new RangeError(`Size must be a non-negative number, got ${bytes}`);
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const rounded = unit === 0 ? String(value) : value.toFixed(1).replace(/\.0$/, '');
  return `${rounded} ${SIZE_UNITS[unit]}`;
}

/**
 * Random hex token of `nbytes` bytes (twice as many characters)
 */
export function generateToken(nbytes = 16): string {
  if (!Number.isInteger(nbytes) || nbytes < 1) {
    throw new RangeError(`Token length must be a positive integer, got ${nbytes}`);
  }
  return randomBytes(nbytes).toString('hex');
}
