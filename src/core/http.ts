import axios, { type AxiosInstance, type Method } from 'axios';

export const createHttpClient = (baseURL: string, timeoutMs = 0): AxiosInstance => {
  return axios.create({
    baseURL,
    timeout: timeoutMs
  });
};

export const sendJson = async <T>(
  client: AxiosInstance,
  method: Method,
  path: string,
  headers?: Record<string, string>
): Promise<T> => {
  const res = await client.request<T>({ method, url: path, headers });
  return res.data;
};

export const getJson = <T>(client: AxiosInstance, path: string, headers?: Record<string, string>): Promise<T> =>
  sendJson<T>(client, 'GET', path, headers);

export const postJson = <T>(client: AxiosInstance, path: string, headers?: Record<string, string>): Promise<T> =>
  sendJson<T>(client, 'POST', path, headers);

export const deleteJson = <T>(client: AxiosInstance, path: string, headers?: Record<string, string>): Promise<T> =>
  sendJson<T>(client, 'DELETE', path, headers);
