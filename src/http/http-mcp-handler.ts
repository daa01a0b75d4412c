import crypto from 'node:crypto';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { LOG_LEVEL } from '../config.js';
import { isRecord } from '../types/index.js';

interface McpSession {
    transport: StreamableHTTPServerTransport;
    server: McpServer;
}

const sessions = new Map<string, McpSession>();

export type McpServerFactory = () => McpServer;

type JsonRpcId = string | number | null;

function sessionIdOf(req: express.Request): string | undefined {
    const header = req.headers['mcp-session-id'];
    return typeof header === 'string' && header !== '' ? header : undefined;
}

function describeRequest(body: unknown): { id: JsonRpcId; method: string; toolName: string } {
    if (!isRecord(body)) {
        return { id: null, method: 'unknown', toolName: 'unknown' };
    }
    const rawId = body['id'];
    const id = typeof rawId === 'string' || typeof rawId === 'number' ? rawId : null;
    const method = typeof body['method'] === 'string' ? body['method'] : 'unknown';
    const params = body['params'];
    const toolName = isRecord(params) && typeof params['name'] === 'string' ? params['name'] : 'unknown';
    return { id, method, toolName };
}

function rpcError(res: express.Response, status: number, code: number, message: string, id: JsonRpcId) {
    res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id });
}

export function activeSessionCount(): number {
    return sessions.size;
}

/**
 * Set up MCP endpoint handling using stateful sessions.
 *
 * Each MCP client session gets its own McpServer + Transport pair.
 * The SDK enforces one-transport-per-server; stateful sessions let
 * multiple clients coexist without "already connected" errors.
 * Responses are plain JSON, so there is no GET stream.
 */
export function setupMcpRoutes(app: express.Express, serverFactory: McpServerFactory) {
    app.post('/mcp', async (req, res) => {
        const requestStart = Date.now();
        const body: unknown = req.body;
        const { id, method, toolName } = describeRequest(body);
        const label = `${method}${toolName !== 'unknown' ? ` (${toolName})` : ''} [id: ${id ?? 'none'}]`;

        if (LOG_LEVEL === 'debug' || method !== 'notifications/cancelled') {
            structuredLogger.info(`→ MCP ${label}`);
        }

        try {
            const sessionId = sessionIdOf(req);
            let session: McpSession | undefined;

            if (method === 'initialize') {
                session = await createSession(serverFactory);
                structuredLogger.info(`MCP session created: ${session.transport.sessionId ?? 'pending'}`);
            } else if (sessionId) {
                session = sessions.get(sessionId);
            }

            if (!session) {
                if (sessionId) {
                    rpcError(res, 404, -32000, 'Session not found', id);
                } else {
                    rpcError(res, 400, -32000, 'Bad Request: Mcp-Session-Id header is required', id);
                }
                return;
            }

            res.on('finish', () => {
                const duration = Date.now() - requestStart;
                if (duration > 10000) {
                    structuredLogger.info(`✓ Request completed in ${duration}ms: ${label}`);
                } else if (LOG_LEVEL === 'debug') {
                    structuredLogger.debug(`✓ Completed ${duration}ms [id: ${id ?? 'none'}]`);
                }
            });

            await session.transport.handleRequest(req, res, body);
        } catch (error) {
            const duration = Date.now() - requestStart;
            structuredLogger.error(`✗ MCP error: ${label} after ${duration}ms`, error);
            if (!res.headersSent) {
                rpcError(res, 500, -32603, 'Internal server error', id);
            }
        }
    });

    // MCP endpoint - reject GET requests (must be POST)
    app.get('/mcp', (req, res) => {
        res.status(405).set('Allow', 'POST, DELETE').json({
            error: 'Method Not Allowed - use POST /mcp'
        });
    });

    app.delete('/mcp', async (req, res) => {
        const sessionId = sessionIdOf(req);
        const session = sessionId ? sessions.get(sessionId) : undefined;
        if (!sessionId || !session) {
            rpcError(res, 404, -32001, 'Session not found', null);
            return;
        }
        try {
            await session.transport.close();
            await session.server.close();
        } catch (error) {
            structuredLogger.warn(`Error while closing MCP session ${sessionId}`, { error: String(error) });
        }
        sessions.delete(sessionId);
        structuredLogger.info(`MCP session closed: ${sessionId}`);
        res.status(200).end();
    });
}

async function createSession(serverFactory: McpServerFactory): Promise<McpSession> {
    const server = serverFactory();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => crypto.randomUUID(),
        enableJsonResponse: true,
        onsessioninitialized: (sessionId: string) => {
            sessions.set(sessionId, session);
            structuredLogger.info(`MCP session registered: ${sessionId} (active: ${sessions.size})`);
        }
    });

    transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid && sessions.has(sid)) {
            sessions.delete(sid);
            structuredLogger.info(`MCP session removed: ${sid} (active: ${sessions.size})`);
        }
    };

    const session: McpSession = { transport, server };

    // Connect server ↔ transport (one-to-one, never reconnected)
    await server.connect(transport);

    return session;
}

/** Close every open session; used on shutdown. */
export async function closeAllSessions(): Promise<void> {
    for (const [sessionId, session] of sessions) {
        await session.transport.close();
        await session.server.close();
        sessions.delete(sessionId);
    }
}
