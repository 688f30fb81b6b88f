// src/index.replay.ts

/**
 * Entry point for a dry run of the engine over a JSON bar file.
 * Uses the configured symbol, risk and strategy selection; logs every intent.
 */
import * as path from 'path';
import { config } from './lib/config/settings';
import { DecisionEngine } from './lib/engine';
import { createLogger } from './lib/logger';
import { loadBarsFromFile, runReplay } from './lib/services/replay';

const logger = createLogger('index.replay');

async function main() {
    const file = path.resolve(process.cwd(), config.replay.file);
    logger.info('Initializing replay', {
        file,
        symbol: config.symbol.name,
        classifier: config.classifier.kind,
        filter: config.filter.kind,
        fractal: config.fractal.enabled,
    });

    const bars = await loadBarsFromFile(file);
    if (bars.length === 0) {
        logger.error('No bars in replay file');
        process.exit(1);
    }

    const engine = DecisionEngine.fromConfig(config);
    const summary = runReplay(
        bars,
        {
            balance: config.replay.balance,
            currency: 'USD',
            symbol: config.symbol,
            htfFactor: config.replay.htfFactor,
        },
        engine
    );

    logger.info('Replay completed', {
        barsProcessed: summary.barsProcessed,
        contexts: summary.contexts,
        diagnostics: summary.diagnostics,
        intents: summary.intents.map(i => ({
            time: new Date(i.timestamp).toISOString(),
            context: i.context,
            side: i.intent.side,
            volume: i.intent.volume,
            lots: i.intent.lots,
        })),
    });
}

main().catch((err: unknown) => {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error('Replay failed', { error: error.message, stack: error.stack });
    process.exit(1);
});
