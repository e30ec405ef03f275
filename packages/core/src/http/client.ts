/**
 * Axios instances for the Atlassian REST APIs (basic auth with an API token).
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  baseURL: string;
  username: string;
  apiToken: string;
  /** Replaces the network layer; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
}

export function createHttpClient(opts: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: opts.baseURL,
    auth: { username: opts.username, password: opts.apiToken },
    headers: { Accept: 'application/json' },
    adapter: opts.adapter,
  });
}
