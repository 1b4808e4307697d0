import type { Logger } from '../common';
import type { Transcriber } from './transcriber';

export interface TranscriberRegistryOptions<TAudio, TConfig> {
    /** Loads a transcriber, e.g. a speech model of a given size. */
    readonly create: (config: TConfig) => Promise<Transcriber<TAudio>>;
    /** Cache key of a configuration. Defaults to its JSON form. */
    readonly key?: (config: TConfig) => string;
    readonly logger?: Logger;
}

/**
 * Caches transcribers per configuration.
 * Each transcriber is created once, even when requested concurrently, and kept until
 * invalidated.
 */
export class TranscriberRegistry<TAudio, TConfig> {
    private readonly cache = new Map<string, Transcriber<TAudio>>();
    private readonly pending = new Map<string, Promise<Transcriber<TAudio>>>();
    private readonly createTranscriber: (config: TConfig) => Promise<Transcriber<TAudio>>;
    private readonly cacheKey: (config: TConfig) => string;
    private readonly logger: Logger;

    constructor(options: TranscriberRegistryOptions<TAudio, TConfig>) {
        this.createTranscriber = options.create;
        this.cacheKey = options.key ?? (config => JSON.stringify(config));
        this.logger = options.logger ?? console;
    }

    /**
     * Get the cached transcriber for a configuration, if it was created already.
     */
    get(config: TConfig): Transcriber<TAudio> | undefined {
        return this.cache.get(this.cacheKey(config));
    }

    has(config: TConfig): boolean {
        return this.cache.has(this.cacheKey(config));
    }

    /**
     * Get or create the transcriber for a configuration.
     * Returns the pending promise while it is being created, so that it is created once.
     * A failed creation is not cached.
     */
    async getOrCreate(config: TConfig): Promise<Transcriber<TAudio>> {
        const key = this.cacheKey(config);

        const cached = this.cache.get(key);
        if (cached) {
            return cached;
        }

        const pending = this.pending.get(key);
        if (pending) {
            return pending;
        }

        // Settles asynchronously, so `promise` is assigned before the callbacks read it.
        const promise: Promise<Transcriber<TAudio>> = Promise.resolve()
            .then(() => {
                this.logger.info(`[TranscriberRegistry] Creating transcriber ${key}`);
                return this.createTranscriber(config);
            })
            .then(transcriber => {
                // Not cached when invalidated or cleared in the meantime.
                if (this.pending.get(key) === promise) {
                    this.cache.set(key, transcriber);
                }
                return transcriber;
            })
            .finally(() => {
                if (this.pending.get(key) === promise) {
                    this.pending.delete(key);
                }
            });

        this.pending.set(key, promise);
        return promise;
    }

    /**
     * Manually set a cached transcriber (useful for testing or preloading).
     */
    set(config: TConfig, transcriber: Transcriber<TAudio>): void {
        this.cache.set(this.cacheKey(config), transcriber);
    }

    invalidate(config: TConfig): void {
        const key = this.cacheKey(config);
        this.cache.delete(key);
        this.pending.delete(key);
    }

    /**
     * Clear all cached transcribers.
     */
    clear(): void {
        this.cache.clear();
        this.pending.clear();
    }
}
