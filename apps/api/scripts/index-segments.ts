import 'dotenv/config';
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { segmentListSchema } from '@clipsearch/types';
import { Core } from '../src/infrastructure/Core';
import { IndexSegments } from '../src/application/useCases/IndexSegments';
import { AppError } from '../src/domain/errors/AppError';
import logger from '../src/infrastructure/logger';

/**
 * Indexes a JSON array of transcript segments into Milvus.
 *
 *   npm run index-segments -- segments.json --window 20 --stride 4 --drop
 */

function parseOptionalInt(name: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = parseInt(value, 10);
    if (Number.isNaN(parsed)) {
        throw new Error(`--${name} expects a number, got "${value}"`);
    }
    return parsed;
}

async function main() {
    const { values, positionals } = parseArgs({
        allowPositionals: true,
        options: {
            window: { type: 'string' },
            stride: { type: 'string' },
            drop: { type: 'boolean', default: false },
        },
    });

    const file = positionals[0];
    if (!file) {
        throw new Error('Usage: index-segments <segments.json> [--window N] [--stride N] [--drop]');
    }

    const segments = segmentListSchema.parse(JSON.parse(await readFile(file, 'utf8')));
    logger.info(`📄 Loaded ${segments.length} segments from ${file}`);

    const abortController = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted, stopping after the current batch');
        abortController.abort();
    });

    const report = await new Core().getUseCase(IndexSegments).execute(segments, {
        window: parseOptionalInt('window', values.window),
        stride: parseOptionalInt('stride', values.stride),
        dropExisting: values.drop,
        signal: abortController.signal,
    });

    logger.info(`✅ Indexed ${report.inserted} chunks in ${report.batches} batches`);
}

main().catch((error) => {
    logger.error('❌ Indexing failed', {
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof AppError ? { details: error.details } : {}),
    });
    process.exit(1);
});
