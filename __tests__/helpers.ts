import { AxiosError, AxiosHeaders } from 'axios';

export function httpError(status: number, message = `Request failed with status code ${status}`): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(message, 'ERR_BAD_REQUEST', config, undefined, {
    status,
    statusText: String(status),
    data: { errors: [{ message }] },
    headers: {},
    config,
  });
}

export function page(data: unknown, next?: string) {
  return { data, headers: next ? { link: `<${next}>; rel="next"` } : {} };
}
