#!/usr/bin/env node
import { registerDependencies } from './container';
import { createProgram } from './cli';
import IClassifier from './Classifier/IClassifier';
import { ILogger } from './lib/logger/ILogger';

async function main(): Promise<void> {
    const container = registerDependencies();
    const logger = container.resolve<ILogger>('ILogger');

    const program = createProgram({
        classifier: container.resolve<IClassifier>('IClassifier'),
        fallback: container.resolve<IClassifier>('FallbackClassifier'),
        logger,
        write: line => console.log(line),
    });

    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    console.error("Error in news-verdict:", error);
    process.exit(1);
});
