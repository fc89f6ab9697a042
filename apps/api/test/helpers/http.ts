import { EventEmitter } from 'node:events';
import type { Request, Response } from 'express';
import { vi } from 'vitest';

/** Records what a handler writes; emits 'close' when the response ends. */
export class ResponseDouble extends EventEmitter {
    statusCode = 200;
    body: unknown;
    headers: Record<string, string> = {};
    chunks: string[] = [];
    writableEnded = false;
    writableFinished = false;

    status = vi.fn((code: number) => {
        this.statusCode = code;
        return this;
    });

    json = vi.fn((body: unknown) => {
        this.body = body;
        this.end();
        return this;
    });

    setHeader = vi.fn((name: string, value: string) => {
        this.headers[name.toLowerCase()] = value;
        return this;
    });

    flushHeaders = vi.fn();

    write = vi.fn((chunk: string) => {
        this.chunks.push(chunk);
        return true;
    });

    end = vi.fn(() => {
        if (this.writableEnded) return this;
        this.writableEnded = true;
        this.writableFinished = true;
        this.emit('close');
        return this;
    });

    /** Client went away before the response finished. */
    disconnect() {
        this.emit('close');
    }

    /** Event names in the order they were written to an SSE stream. */
    sseEvents(): string[] {
        return this.chunks
            .filter((chunk) => chunk.startsWith('event: '))
            .map((chunk) => chunk.slice('event: '.length).trim());
    }
}

export const mockRequest = (init: { body?: unknown; params?: Record<string, string>; path?: string } = {}) =>
    ({ body: init.body, params: init.params ?? {}, path: init.path ?? '/' }) as unknown as Request;

export const asResponse = (res: ResponseDouble) => res as unknown as Response;
