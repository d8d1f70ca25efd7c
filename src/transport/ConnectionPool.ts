/**
 * @packageDocumentation
 * @module ConnectionPool
 * @description
 * Keep-alive HTTP agents for one transport scope.
 *
 * A checkout operation issues several sequential requests to the same
 * merchant (fetch snapshot, update, three negotiation rounds). The pool
 * keeps those on one socket where the merchant allows it and is destroyed
 * when the scope closes.
 */

import https from 'https';
import http from 'http';
import { PoolConfig } from '../types/agent';

export class ConnectionPool {
    private httpsAgent: https.Agent;
    private httpAgent: http.Agent;
    private requestCount = 0;
    private destroyed = false;

    constructor(config: PoolConfig) {
        const options = {
            keepAlive: true,
            keepAliveMsecs: config.keepAliveMsecs,
            maxSockets: config.maxSockets,
            maxFreeSockets: config.maxSockets,
            scheduling: 'fifo' as const,
        };

        this.httpsAgent = new https.Agent(options);
        this.httpAgent = new http.Agent(options);
    }

    /**
     * Get agent based on URL protocol.
     */
    getAgentForUrl(url: string): http.Agent | https.Agent {
        this.requestCount++;
        return url.startsWith('https://') ? this.httpsAgent : this.httpAgent;
    }

    getRequestCount(): number {
        return this.requestCount;
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }

    /**
     * Destroy all connections. Safe to call more than once.
     */
    destroy(): void {
        if (this.destroyed) return;
        this.httpsAgent.destroy();
        this.httpAgent.destroy();
        this.destroyed = true;
    }
}
