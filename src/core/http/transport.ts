// src/core/http/transport.ts

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpConfig } from './types';

/**
 * Connection pool shared by the authenticator and every logical call of one
 * client. Released once, by close().
 */
export interface Transport {
  readonly client: AxiosInstance;
  close(): void;
}

export function createTransport(config: HttpConfig): Transport {
  const httpAgent = new http.Agent({ keepAlive: config.keepAlive });
  const httpsAgent = new https.Agent({ keepAlive: config.keepAlive });

  const client = axios.create({
    timeout: config.timeoutMs,
    httpAgent,
    httpsAgent,
    maxRedirects: 5,
  });

  return {
    client,
    close() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
