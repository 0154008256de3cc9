import { Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import {
  UpstreamStatusError,
  UpstreamTransportError,
} from './ipma.errors';

export const UPSTREAM_TIMEOUT_MS = 20_000;

/**
 * GET a JSON document from IPMA.
 *
 * Fails with `UpstreamStatusError` on a non-2xx answer and with
 * `UpstreamTransportError` when no answer arrives within the timeout.
 */
@Injectable()
export class IpmaHttpService {
  private readonly logger = new Logger(IpmaHttpService.name);

  async getJson<T>(url: string): Promise<T> {
    this.logger.debug(`GET ${url}`);

    try {
      const response = await axios.get<T>(url, {
        timeout: UPSTREAM_TIMEOUT_MS,
        headers: { Accept: 'application/json' },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          this.logger.warn(
            `IPMA returned ${error.response.status} for ${url}`,
          );
          throw new UpstreamStatusError(url, error.response.status);
        }
        this.logger.warn(
          `IPMA unreachable for ${url} (${error.code ?? 'unknown'}): ${error.message}`,
        );
        throw new UpstreamTransportError(url, error.code, error.message);
      }
      throw error;
    }
  }
}
