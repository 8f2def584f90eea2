import fetch, { RequestInit, Response } from 'node-fetch';

export default function safeFetch(
  url: string,
  params: RequestInit,
): Promise<Response> {
  return fetch(url, params);
}
