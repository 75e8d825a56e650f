import type { Response } from 'express';

export type ResponseEnvelope =
    | { status: 'success'; message: string; data: unknown }
    | { status: 'error'; message: string; error: unknown };

const send = (res: Response, statusCode: number, body: ResponseEnvelope) => {
    if (res.headersSent) {
        return;
    }
    res.status(statusCode).json(body);
};

const sendHTTPResponse = {
    success: (res: Response, statusCode: number = 200, message: string, data?: unknown) =>
        send(res, statusCode, { status: 'success', message, data: data ?? null }),
    error: (res: Response, statusCode: number, message: string, errorDetails?: unknown) =>
        send(res, statusCode || 500, { status: 'error', message, error: errorDetails ?? null })
};

export default sendHTTPResponse;
