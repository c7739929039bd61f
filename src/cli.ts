import { promises as fs } from 'fs';
import { Command } from 'commander';
import IClassifier from './Classifier/IClassifier';
import { ClassificationRequest, ClassificationResult } from './Classifier/ClassificationResult';
import { InferenceUnavailableError } from './Classifier/errors/ClassifierErrors';
import { ILogger } from './lib/logger/ILogger';

export interface CliDependencies {
    classifier: IClassifier;
    fallback: IClassifier;
    logger: ILogger;
    write: (line: string) => void;
    readFile?: (path: string) => Promise<string>;
}

interface ClassifyCommandOptions {
    title: string;
    content?: string;
    file?: string;
    fallback?: boolean;
    json?: boolean;
}

export const SAMPLE_ARTICLES: Array<ClassificationRequest & { name: string }> = [
    {
        name: 'Obvious fake',
        title: "SHOCKING: Scientists Discover Miracle Cure They Don't Want You To Know!",
        content: 'In an unbelievable revelation, a secret group of researchers has discovered a miracle cure for all diseases. '
            + 'The conspiracy to hide this from the public has been exposed. You won\'t believe what happens next! '
            + 'Share before it gets deleted!',
    },
    {
        name: 'Likely real',
        title: 'Federal Reserve Announces Interest Rate Decision',
        content: 'The Federal Reserve announced today that it will maintain current interest rates, citing stable inflation data. '
            + 'The committee will continue to monitor economic indicators. Markets responded with modest gains.',
    },
];

export function formatResult(result: ClassificationResult, json = false): string {
    if (json) {
        return JSON.stringify({ label: result.label, confidence: result.confidence });
    }
    return `${result.label} (confidence ${result.confidence.toFixed(2)})`;
}

export function createProgram(deps: CliDependencies): Command {
    const readFile = deps.readFile ?? ((path: string) => fs.readFile(path, 'utf8'));

    const program = new Command();
    program.name('news-verdict').description('Classify news articles as fake or real with a local Ollama model.');

    program
        .command('classify')
        .description('Classify a single article.')
        .option('-t, --title <text>', 'Article headline.', '')
        .option('-c, --content <text>', 'Article body.')
        .option('-f, --file <path>', 'Read the article body from a file.')
        .option('--fallback', 'Use the keyword heuristic if the inference endpoint is unavailable.')
        .option('--json', 'Print the result as JSON.')
        .action(async (options: ClassifyCommandOptions) => {
            const content = options.file !== undefined ? await readFile(options.file) : options.content;
            if (content === undefined) {
                throw new Error('Either --content or --file is required');
            }
            const result = await classifyWithFallback(deps, options.title, content, options.fallback === true);
            deps.write(formatResult(result, options.json === true));
        });

    program
        .command('demo')
        .description('Classify the built-in sample articles.')
        .option('--fallback', 'Use the keyword heuristic if the inference endpoint is unavailable.')
        .action(async (options: { fallback?: boolean }) => {
            for (const sample of SAMPLE_ARTICLES) {
                const result = await classifyWithFallback(deps, sample.title, sample.content, options.fallback === true);
                deps.write(`[${sample.name}] ${sample.title}`);
                deps.write(`  ${formatResult(result)}`);
            }
        });

    return program;
}

async function classifyWithFallback(
    deps: CliDependencies,
    title: string,
    content: string,
    allowFallback: boolean,
): Promise<ClassificationResult> {
    try {
        return await deps.classifier.classify(title, content);
    } catch (error) {
        if (allowFallback && error instanceof InferenceUnavailableError) {
            deps.logger.warn(`Falling back to keyword heuristic: ${error.message}`);
            return deps.fallback.classify(title, content);
        }
        throw error;
    }
}
