/**
 * Rate limiter for the remote APIs spindle talks to.
 *
 * One queue per service with exponential backoff on 429 and transient network
 * errors, and a circuit breaker that pauses a service after repeated rate
 * limiting. Retrying lives here, in the clients' plumbing; the playback
 * engine never retries a scrobble itself.
 */

import PQueue from "p-queue";
import axios from "axios";
import { logger } from "../utils/logger";

interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Maximum retries on 429 or transient errors */
    maxRetries: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
}

interface ServiceConfig {
    lastfm: RateLimitConfig;
    discogs: RateLimitConfig;
}

const SERVICE_CONFIGS: ServiceConfig = {
    lastfm: {
        intervalCap: 3, // Last.fm allows 5/s per key
        interval: 1000,
        concurrency: 2,
        maxRetries: 2,
        baseDelay: 1000,
    },
    discogs: {
        intervalCap: 1, // 60/min authenticated, 25/min anonymous
        interval: 1000,
        concurrency: 1,
        maxRetries: 2,
        baseDelay: 2000,
    },
};

type ServiceName = keyof ServiceConfig;

const SERVICE_NAMES: ServiceName[] = ["lastfm", "discogs"];

interface CircuitState {
    isOpen: boolean;
    openedAt: number;
    consecutiveFailures: number;
    resetAfterMs: number;
}

const INITIAL_CIRCUIT_RESET_MS = 30000;
const MAX_BACKOFF_MS = 60000;

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

function errorStatus(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isRateLimitError(error: unknown): boolean {
    const message = errorMessage(error).toLowerCase();
    return (
        errorStatus(error) === 429 ||
        message.includes("429") ||
        message.includes("rate limit")
    );
}

export function isTransientError(error: unknown): boolean {
    const code =
        typeof error === "object" && error !== null && "code" in error
            ? error.code
            : undefined;
    if (typeof code === "string" && TRANSIENT_CODES.has(code)) {
        return true;
    }

    const status = errorStatus(error);
    if (typeof status === "number" && status >= 500 && status <= 599) {
        return true;
    }

    const message = errorMessage(error).toLowerCase();
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

class GlobalRateLimiter {
    private queues: Map<ServiceName, PQueue> = new Map();
    private circuitBreakers: Map<ServiceName, CircuitState> = new Map();

    constructor() {
        for (const service of SERVICE_NAMES) {
            const serviceConfig = SERVICE_CONFIGS[service];
            this.queues.set(
                service,
                new PQueue({
                    concurrency: serviceConfig.concurrency,
                    intervalCap: serviceConfig.intervalCap,
                    interval: serviceConfig.interval,
                    carryoverConcurrencyCount: true,
                })
            );

            this.circuitBreakers.set(service, {
                isOpen: false,
                openedAt: 0,
                consecutiveFailures: 0,
                resetAfterMs: INITIAL_CIRCUIT_RESET_MS,
            });
        }

        logger.debug("Global rate limiter initialized");
    }

    /**
     * Execute a request with rate limiting and automatic retry
     */
    async execute<T>(service: ServiceName, requestFn: () => Promise<T>): Promise<T> {
        const queue = this.queues.get(service);
        const circuit = this.circuitBreakers.get(service);
        const serviceConfig = SERVICE_CONFIGS[service];

        if (!queue || !circuit) {
            throw new Error(`Unknown service: ${service}`);
        }

        if (circuit.isOpen) {
            const elapsed = Date.now() - circuit.openedAt;
            if (elapsed < circuit.resetAfterMs) {
                const waitTime = circuit.resetAfterMs - elapsed;
                logger.debug(
                    `Circuit breaker open for ${service} - waiting ${waitTime}ms`
                );
                await this.sleep(waitTime);
            }
            circuit.isOpen = false;
            circuit.consecutiveFailures = 0;
            circuit.resetAfterMs = INITIAL_CIRCUIT_RESET_MS;
        }

        const maxRetries = serviceConfig.maxRetries;
        let lastError: unknown = null;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            try {
                const result = await queue.add(() => requestFn());

                circuit.consecutiveFailures = 0;
                return result;
            } catch (error) {
                lastError = error;

                const isRateLimit = isRateLimitError(error);
                if (!isRateLimit && !isTransientError(error)) {
                    throw error;
                }

                const delay = this.calculateBackoff(
                    attempt,
                    serviceConfig.baseDelay,
                    error
                );

                if (isRateLimit) {
                    circuit.consecutiveFailures++;
                    logger.warn(
                        `Rate limited by ${service} (attempt ${attempt + 1}/${
                            maxRetries + 1
                        }) - backing off ${delay}ms`
                    );

                    if (circuit.consecutiveFailures >= 5) {
                        circuit.isOpen = true;
                        circuit.openedAt = Date.now();
                        circuit.resetAfterMs = Math.min(
                            MAX_BACKOFF_MS,
                            circuit.resetAfterMs * 2
                        );
                        logger.warn(
                            `Circuit breaker opened for ${service} - will reset in ${circuit.resetAfterMs}ms`
                        );
                    }
                } else {
                    logger.warn(
                        `Transient ${service} error (attempt ${attempt + 1}/${
                            maxRetries + 1
                        }) - retrying in ${delay}ms: ${errorMessage(error)}`
                    );
                }

                if (attempt < maxRetries) {
                    await this.sleep(delay);
                }
            }
        }

        throw lastError instanceof Error
            ? lastError
            : new Error("Request failed after retries");
    }

    /**
     * Exponential backoff with jitter, honouring Retry-After when present
     */
    private calculateBackoff(
        attempt: number,
        baseDelay: number,
        error: unknown
    ): number {
        if (axios.isAxiosError(error)) {
            const retryAfter: unknown = error.response?.headers?.["retry-after"];
            if (typeof retryAfter === "string") {
                const parsed = Number.parseInt(retryAfter, 10);
                if (!Number.isNaN(parsed)) {
                    return parsed * 1000;
                }
            }
        }

        const exponentialDelay = baseDelay * Math.pow(2, attempt);
        const jitter = Math.random() * 1000;
        return Math.min(exponentialDelay + jitter, MAX_BACKOFF_MS);
    }

    /**
     * Drop queued requests that have not started yet
     */
    clear(): void {
        for (const queue of this.queues.values()) {
            queue.clear();
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

export const rateLimiter = new GlobalRateLimiter();

export type { ServiceName, RateLimitConfig };
