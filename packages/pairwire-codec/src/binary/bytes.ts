export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Hex dump of up to `length` bytes from `offset`, the byte at `mark` bracketed. */
export function hexDump(buf: Uint8Array, offset: number, length: number, mark = offset): string {
  const start = Math.max(0, offset);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === mark ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
