export function assertSliceBounds(
  total: number,
  offset: number,
  len: number,
): void {
  if (!Number.isInteger(offset) || !Number.isInteger(len)
      || offset < 0 || len < 0 || offset + len > total) {
    throw new RangeError('read() slice exceeds data bounds');
  }
}
