/**
 * Failures of the upstream fetch. Both carry the URL that was requested.
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

/**
 * No response was received (DNS, connection refused, timeout)
 */
export class UpstreamTransportError extends UpstreamError {
  constructor(
    url: string,
    public readonly transportCode: string | undefined,
    reason: string,
  ) {
    super(`IPMA request to ${url} failed: ${reason}`, url, 'UPSTREAM_UNREACHABLE');
    this.name = 'UpstreamTransportError';
  }

  get isTimeout(): boolean {
    return (
      this.transportCode === 'ECONNABORTED' ||
      this.transportCode === 'ETIMEDOUT'
    );
  }
}

/**
 * The upstream answered with a non-2xx status
 */
export class UpstreamStatusError extends UpstreamError {
  constructor(
    url: string,
    public readonly status: number,
  ) {
    super(
      `IPMA request to ${url} returned status ${status}`,
      url,
      'UPSTREAM_BAD_STATUS',
    );
    this.name = 'UpstreamStatusError';
  }
}
