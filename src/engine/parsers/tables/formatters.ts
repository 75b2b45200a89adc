/**
 * Shared formatters for table decoding (TTX-like output).
 */

export function fixed16ToDecimal(raw: number): string {
  const val = raw / 65536;
  return Number.isInteger(val) ? val.toFixed(1) : val.toFixed(3).replace(/0+$/, "");
}

export function u16ToBinary(n: number): string {
  const s = ((n >>> 0) & 0xffff).toString(2).padStart(16, "0");
  return `${s.slice(0, 8)} ${s.slice(8)}`;
}

export function u32ToHex(n: number): string {
  return `0x${(n >>> 0).toString(16).toLowerCase().padStart(8, "0")}`;
}

/**
 * LONGDATETIME (seconds since 1904-01-01 UTC) as an asctime string
 */
export function macTimeToAsctime(view: DataView, offset: number): string {
  const hi = view.getUint32(offset, false);
  const lo = view.getUint32(offset + 4, false);
  const secs = hi * 0x1_0000_0000 + lo;
  const d = new Date(Date.UTC(1904, 0, 1) + secs * 1000);
  if (Number.isNaN(d.getTime())) return `invalid (${secs})`;
  const w = d.toLocaleString("en-US", { weekday: "short", timeZone: "UTC" });
  const M = d.toLocaleString("en-US", { month: "short", timeZone: "UTC" });
  const day = d.getUTCDate();
  const h = String(d.getUTCHours()).padStart(2, "0");
  const m = String(d.getUTCMinutes()).padStart(2, "0");
  const s = String(d.getUTCSeconds()).padStart(2, "0");
  return `${w} ${M} ${day} ${h}:${m}:${s} ${d.getUTCFullYear()}`;
}

export function hexCodepoint(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, "0")}`;
}
