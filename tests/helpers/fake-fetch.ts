import type { FetchLike } from "../../lib/http.ts";

export type Route = (request: Request) => Response | Promise<Response>;

export type RecordedRequest = {
    method: string;
    url: string;
};

export type TelegramUpload = {
    chatId: string | null;
    fileName: string;
    content: ArrayBuffer;
};

export const createFakeFetch = (routes: Record<string, Route>) => {
    const requests: RecordedRequest[] = [];
    const fetch: FetchLike = async (input, init) => {
        const request = input instanceof Request ? input : new Request(input, init);
        requests.push({ method: request.method, url: request.url });
        const route = routes[request.url];
        if (!route) {
            return new Response("not found", { status: 404 });
        }
        return await route(request);
    };
    return { fetch, requests };
};

export const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

/** Route that accepts sendDocument uploads and keeps what was posted. */
export const telegramRoute = (uploads: TelegramUpload[]): Route => async (request) => {
    const form = await request.formData();
    const document = form.get("document");
    if (document === null || typeof document === "string") {
        return jsonResponse({ ok: false, description: "Bad Request: there is no document in the request" }, 400);
    }
    const chatId = form.get("chat_id");
    uploads.push({
        chatId: typeof chatId === "string" ? chatId : null,
        fileName: document.name,
        content: await document.arrayBuffer(),
    });
    return jsonResponse({ ok: true, result: { message_id: uploads.length } });
};
