import axios, { AxiosInstance, AxiosError } from 'axios';
import { logger } from '../logger.js';
import { DeadlinesConfig } from '../types.js';

export function createCanvasClient(
  config: Pick<DeadlinesConfig, 'apiToken' | 'baseUrl' | 'timeoutMs'>
): AxiosInstance {
  const instance = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      Authorization: `Bearer ${config.apiToken}`,
      Accept: 'application/json',
    },
  });

  instance.interceptors.response.use(
    response => response,
    (error: AxiosError) => {
      const status = error.response?.status;
      logger.error(
        { status, url: error.config?.url, data: error.response?.data },
        `Canvas API error${status ? ` (${status})` : ''}: ${error.message}`
      );
      return Promise.reject(error);
    }
  );

  return instance;
}
