import { TranslationMode } from '../../domain/entities/Translation';
import { ITranslationStrategy } from '../../domain/ports/ITranslationStrategy';
import { PromptChainStrategy } from './PromptChainStrategy';
import { SimpleStrategy } from './SimpleStrategy';

export type StrategyRegistry = Readonly<Record<TranslationMode, ITranslationStrategy>>;

/**
 * One shared, stateless strategy instance per mode.
 */
export function createStrategies(defaultConfidence: number): StrategyRegistry {
    return Object.freeze({
        simple: new SimpleStrategy(defaultConfidence),
        chain: new PromptChainStrategy(defaultConfidence),
    });
}

export { SimpleStrategy } from './SimpleStrategy';
export { PromptChainStrategy } from './PromptChainStrategy';
