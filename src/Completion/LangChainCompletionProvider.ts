import { BaseLLM } from "@langchain/core/language_models/llms";
import { ITextCompletionProvider } from "./ITextCompletionProvider";
import { InferenceUnavailableError } from "../Classifier/errors/ClassifierErrors";
import { ILogger } from "../lib/logger/ILogger";

export interface LangChainCompletionOptions {
    /** Reported on failure so the caller knows which endpoint was down. */
    endpoint: string;
    timeoutMs?: number;
}

/**
 * Completion provider backed by any LangChain text LLM (Ollama in production).
 */
export class LangChainCompletionProvider implements ITextCompletionProvider {
    constructor(
        private readonly llm: BaseLLM,
        private readonly options: LangChainCompletionOptions,
        private readonly logger: ILogger,
    ) { }

    async complete(prompt: string): Promise<string> {
        const started = Date.now();
        try {
            const text = await this.llm.invoke(prompt, { timeout: this.options.timeoutMs });
            this.logger.debug(`Completion received in ${Date.now() - started}ms`, { characters: text.length });
            return text;
        } catch (error) {
            this.logger.error(`Inference endpoint ${this.options.endpoint} failed`, {
                error: error instanceof Error ? error.message : String(error),
            });
            throw new InferenceUnavailableError(this.options.endpoint, error);
        }
    }
}
