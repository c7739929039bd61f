import { Ollama } from "@langchain/ollama";
import { inject, injectable } from "tsyringe";
import IClassifier from "./IClassifier";
import { LLMClassifier } from "./LLMClassifier";
import { KeywordClassifier } from "./KeywordClassifier";
import { ResponseParser } from "./ResponseParser";
import { ITextCompletionProvider } from "../Completion/ITextCompletionProvider";
import { LangChainCompletionProvider } from "../Completion/LangChainCompletionProvider";
import { createTimeoutFetch } from "../Completion/timeoutFetch";
import { ClassifierConfig } from "../Config/config";
import { ILogger } from "../lib/logger/ILogger";

@injectable()
export class ClassifierFactory {
    constructor(@inject("ILogger") private readonly logger: ILogger) { }

    /**
     * Creates a completion provider for an Ollama server. The client posts to
     * `{url}/api/generate` with `stream: true` and joins the NDJSON chunks of the reply,
     * rather than reading a single JSON body.
     * Retries are disabled: a failed call surfaces to the caller straight away.
     * With `timeoutMs` set, the wait for the response headers is bounded by the fetch
     * wrapper and the wait between chunks by the call's own timeout.
     */
    createOllamaProvider(config: ClassifierConfig): ITextCompletionProvider {
        const llm = new Ollama({
            baseUrl: config.ollama.url,
            model: config.ollama.model,
            temperature: config.ollama.temperature,
            numPredict: config.ollama.numPredict,
            maxRetries: 0,
            fetch: config.ollama.timeoutMs !== undefined ? createTimeoutFetch(config.ollama.timeoutMs) : undefined,
        });
        return new LangChainCompletionProvider(llm, {
            endpoint: `${config.ollama.url}/api/generate`,
            timeoutMs: config.ollama.timeoutMs,
        }, this.logger);
    }

    createLLMClassifier(config: ClassifierConfig, provider?: ITextCompletionProvider): IClassifier {
        return new LLMClassifier(
            provider ?? this.createOllamaProvider(config),
            new ResponseParser(this.logger, config),
            config,
            this.logger,
        );
    }

    createKeywordClassifier(): IClassifier {
        return new KeywordClassifier();
    }
}
