import { TimeoutError } from "ky";
import type { KyInstance } from "ky";
import { z } from "zod";
import type { TelegramConfig } from "./config.ts";

export class MissingCredentialsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "MissingCredentialsError";
    }
}

export type TelegramDocument = {
    fileName: string;
    content: Blob;
};

const SendDocumentResponseSchema = z.object({
    ok: z.boolean(),
    description: z.string().optional(),
});

export const requireTelegramCredentials = ({ botToken, chatId }: TelegramConfig) => {
    if (!botToken || !chatId) {
        throw new MissingCredentialsError("Telegram credentials missing, set BOT_TOKEN and CHAT_ID");
    }
    return { botToken, chatId };
}

//the request URL carries the bot token, so ky's own errors never leave this module
const postDocument = async (http: KyInstance, url: string, form: FormData, fileName: string) => {
    try {
        return await http.post(url, { body: form, throwHttpErrors: false });
    } catch (error) {
        if (error instanceof TimeoutError) {
            throw new Error(`Telegram request for ${fileName} timed out`);
        }
        throw error;
    }
}

const readReply = async (response: Response) => {
    const text = await response.text();
    const reply = SendDocumentResponseSchema.safeParse(parseJson(text));
    if (reply.success) return reply.data;
    return { ok: false, description: `HTTP ${response.status} ${response.statusText}`.trim() };
}

const parseJson = (text: string): unknown => {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

export const sendTelegramDocument = async (http: KyInstance, telegram: TelegramConfig, document: TelegramDocument) => {
    const { botToken, chatId } = requireTelegramCredentials(telegram);

    const form = new FormData();
    form.append("chat_id", chatId);
    form.append("document", document.content, document.fileName);

    const response = await postDocument(http, `${telegram.apiBaseUrl}/bot${botToken}/sendDocument`, form, document.fileName);
    const reply = await readReply(response);
    if (!response.ok || !reply.ok) {
        throw new Error(`Telegram rejected ${document.fileName}: ${reply.description ?? `HTTP ${response.status}`}`);
    }
}
