/**
 * @packageDocumentation
 * @module TransportClient
 * @description
 * HTTP transport for one merchant.
 *
 * Attaches the protocol headers to every request and folds every failure
 * into one of the {@link TransportError} kinds. It never retries: each
 * call is exactly one physical request with its own idempotency key.
 *
 * The transport is scoped: {@link TransportClient.open} acquires the
 * connection pool and axios instance, {@link TransportClient.close}
 * releases them. Prefer {@link withTransport}, which closes on every exit
 * path.
 */
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { TransportConfig } from '../types/agent';
import {
    ClientMisuseError,
    DecodeError,
    NetworkError,
    ProtocolHTTPError,
    TransportError,
} from '../types/errors';
import { Result, err, ok } from '../types/result';
import { ConnectionPool } from './ConnectionPool';
import { HttpMethod, RequestSigner } from './RequestSigner';

export class TransportClient {
    readonly merchantUrl: string;
    private signer: RequestSigner;
    private pool?: ConnectionPool;
    private http?: AxiosInstance;

    constructor(merchantUrl: string, private config: TransportConfig) {
        this.merchantUrl = merchantUrl.replace(/\/+$/, '');
        this.signer = new RequestSigner(config.signingKey);
    }

    get isOpen(): boolean {
        return this.http !== undefined;
    }

    open(): void {
        if (this.http) return;

        this.pool = new ConnectionPool(this.config.pool);
        this.http = axios.create({
            timeout: this.config.timeoutMs,
            // Status and JSON are interpreted here, not by axios.
            responseType: 'text',
            validateStatus: () => true,
            ...(this.config.adapter && { adapter: this.config.adapter }),
        });
    }

    close(): void {
        this.pool?.destroy();
        this.pool = undefined;
        this.http = undefined;
    }

    async send(method: HttpMethod, path: string, body?: unknown): Promise<Result<unknown, TransportError>> {
        if (!this.http || !this.pool) {
            return err(new ClientMisuseError('Client not initialized. Open the transport before sending requests.'));
        }

        const url = `${this.merchantUrl}${path}`;
        const payload = body === undefined ? '' : JSON.stringify(body);
        const signed = await this.signer.sign(method, path, payload);
        const agent = this.pool.getAgentForUrl(url);

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                method,
                url,
                data: body === undefined ? undefined : payload,
                headers: {
                    'Content-Type': 'application/json',
                    'UCP-Agent': `profile="${this.config.agentProfileUrl}"`,
                    ...signed,
                },
                ...(url.startsWith('https://') ? { httpsAgent: agent } : { httpAgent: agent }),
            });
        } catch (error) {
            return err(this.toTransportError(error, method, url));
        }

        if (this.config.debug) {
            console.error(`[Transport] ${method} ${url} -> ${response.status}`);
        }

        const parsed = parseBody(response.data);
        if (response.status < 200 || response.status >= 300) {
            return err(new ProtocolHTTPError(
                response.status,
                parsed.ok ? parsed.value : response.data,
                { method, url }
            ));
        }
        if (!parsed.ok) {
            return err(new DecodeError(parsed.error, { method, url }));
        }
        return ok(parsed.value);
    }

    private toTransportError(error: unknown, method: HttpMethod, url: string): TransportError {
        if (this.config.debug) {
            console.error(`[Transport] ${method} ${url} failed:`, error);
        }
        if (axios.isAxiosError(error) && error.response) {
            const parsed = parseBody(error.response.data);
            return new ProtocolHTTPError(
                error.response.status,
                parsed.ok ? parsed.value : error.response.data,
                { method, url }
            );
        }
        return new NetworkError(
            error instanceof Error ? error : new Error(String(error)),
            { method, url }
        );
    }
}

function parseBody(data: unknown): Result<unknown, Error> {
    if (typeof data !== 'string') return ok(data);
    try {
        return ok(JSON.parse(data));
    } catch (error) {
        return err(error instanceof Error ? error : new SyntaxError(String(error)));
    }
}

/**
 * Open a transport, run `fn` with it and close it on every exit path.
 */
export async function withTransport<T>(
    merchantUrl: string,
    config: TransportConfig,
    fn: (transport: TransportClient) => Promise<T>
): Promise<T> {
    const transport = new TransportClient(merchantUrl, config);
    transport.open();
    try {
        return await fn(transport);
    } finally {
        transport.close();
    }
}
