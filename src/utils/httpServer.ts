/**
 * HTTP listener lifecycle for the Hono apps (webhook intake and status API).
 */
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';
import { LogEngine } from '@wgtechlabs/log-engine';

export interface HttpListener {
    readonly name: string;
    close(): Promise<void>;
}

/**
 * Starts listening and resolves once the socket is bound.
 */
export function startHttpServer(name: string, app: Hono, hostname: string, port: number): Promise<HttpListener> {
    return new Promise((resolve, reject) => {
        const server = serve({ fetch: app.fetch, hostname, port }, (info) => {
            LogEngine.info(`🌐 ${name} listening on ${hostname}:${info.port}`);
            resolve({
                name,
                close: () => new Promise<void>((resolveClose, rejectClose) => {
                    server.close((error?: Error) => {
                        if (error) {
                            rejectClose(error);
                            return;
                        }
                        LogEngine.info(`${name} stopped`);
                        resolveClose();
                    });
                })
            });
        });

        server.once('error', (error: Error) => {
            LogEngine.error(`Failed to start ${name}`, { hostname, port, error: error.message });
            reject(error);
        });
    });
}
