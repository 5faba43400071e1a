/** Convert a base64 string (optionally a data: URL) to a Buffer */
export function base64ToBuffer(base64: string): Buffer {
  const cleaned = base64.replace(/^data:[\w.+-]+\/[\w.+-]+;base64,/, '');
  return Buffer.from(cleaned, 'base64');
}
