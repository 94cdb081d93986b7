/** The slice of the Express request the guards read. */
export interface GuardedRequest {
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
  socket?: { remoteAddress?: string };
}

/** The slice of the Express response the guards write. */
export interface HeaderSink {
  setHeader(name: string, value: string): unknown;
}

export function headerValue(
  request: GuardedRequest,
  name: string,
): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
