import { LanguageCode, TranslationResult } from '../domain/entities/Translation';
import { IBackendProvider } from '../domain/ports/IBackendProvider';
import { ITranslationStrategy } from '../domain/ports/ITranslationStrategy';
import { ErrorDescriptor, describeError } from './ErrorMapping';

export type BatchOutcome =
    | { ok: true; result: TranslationResult }
    | { ok: false; original: string; error: ErrorDescriptor };

/**
 * Counting semaphore bounding how many items talk to the backend at once.
 */
class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

/**
 * Runs a strategy once per text. Items are independent: a failed item becomes
 * an error slot and never aborts the batch. Slot i always belongs to texts[i].
 */
export class BatchExecutor {
    private readonly concurrency: number;

    constructor(concurrency: number = 4) {
        this.concurrency = Math.max(1, Math.floor(concurrency));
    }

    async run(
        texts: readonly string[],
        sourceLang: LanguageCode,
        targetLang: LanguageCode,
        strategy: ITranslationStrategy,
        provider: IBackendProvider
    ): Promise<BatchOutcome[]> {
        // Each run gets its own semaphore; nothing is shared between batches.
        const semaphore = new Semaphore(this.concurrency);
        const outcomes: BatchOutcome[] = new Array(texts.length);

        const processOne = async (text: string, index: number): Promise<void> => {
            await semaphore.acquire();
            try {
                const result = await strategy.execute(text, sourceLang, targetLang, provider);
                outcomes[index] = { ok: true, result };
            } catch (error) {
                const descriptor = describeError(error);
                console.warn(`[Batch] Item ${index + 1}/${texts.length} failed (${descriptor.kind}): ${descriptor.message}`);
                outcomes[index] = { ok: false, original: text, error: descriptor };
            } finally {
                semaphore.release();
            }
        };

        await Promise.all(texts.map((text, index) => processOne(text, index)));

        const failed = outcomes.filter((o) => !o.ok).length;
        console.log(`[Batch] ${texts.length - failed}/${texts.length} items translated (${strategy.mode})`);

        return outcomes;
    }
}
