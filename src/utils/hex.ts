// Upper-case hex, zero-padded to `width` digits.
export function hex(value: number, width = 1): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}
