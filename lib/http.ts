import ky from "ky";
import type { KyInstance } from "ky";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type HttpClientOptions = {
    timeoutMs: number;
    fetch?: FetchLike;
};

//retry is disabled, the first failure propagates to the caller
export const createHttpClient = ({ timeoutMs, fetch }: HttpClientOptions): KyInstance => ky.create({
    timeout: timeoutMs,
    retry: 0,
    ...(fetch ? { fetch } : {}),
});
