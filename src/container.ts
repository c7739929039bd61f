import 'reflect-metadata';
import { container } from 'tsyringe';
import { ILogger } from './lib/logger/ILogger';
import { WinstonLogger } from './lib/logger/WinstonLogger';
import { ClassifierConfig, loadConfig } from './Config/config';
import { ClassifierFactory } from './Classifier/ClassifierFactory';
import { ITextCompletionProvider } from './Completion/ITextCompletionProvider';
import IClassifier from './Classifier/IClassifier';

/**
 * Registers the production wiring. Call once at process start.
 */
export function registerDependencies(config: ClassifierConfig = loadConfig()): typeof container {
    container.register<ClassifierConfig>('ClassifierConfig', { useValue: config });

    // Register WinstonLogger as the ILogger implementation for dependency injection.
    container.registerSingleton<ILogger>('ILogger', WinstonLogger);

    // The Ollama-backed provider is what LLMClassifier talks to.
    container.register<ITextCompletionProvider>('ITextCompletionProvider', {
        useFactory: c => c.resolve(ClassifierFactory).createOllamaProvider(c.resolve<ClassifierConfig>('ClassifierConfig'))
    });

    container.register<IClassifier>('IClassifier', {
        useFactory: c => c.resolve(ClassifierFactory).createLLMClassifier(
            c.resolve<ClassifierConfig>('ClassifierConfig'),
            c.resolve<ITextCompletionProvider>('ITextCompletionProvider')
        )
    });
    container.register<IClassifier>('FallbackClassifier', {
        useFactory: c => c.resolve(ClassifierFactory).createKeywordClassifier()
    });

    return container;
}

export { container };
