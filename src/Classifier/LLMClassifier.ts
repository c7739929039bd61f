import { PromptTemplate } from "@langchain/core/prompts";
import { inject, injectable } from "tsyringe";
import IClassifier from "./IClassifier";
import { ClassificationResult } from "./ClassificationResult";
import { ResponseParser } from "./ResponseParser";
import { ITextCompletionProvider } from "../Completion/ITextCompletionProvider";
import { ClassifierConfig } from "../Config/config";
import { ILogger } from "../lib/logger/ILogger";

const DETECTION_PROMPT = new PromptTemplate({
    template: `You are a fake news detection expert. Analyze this news article and determine if it's FAKE or REAL.

TITLE: {title}

CONTENT: {content}

Analyze for:
1. Sensationalist language (shocking, unbelievable, miracle)
2. Lack of credible sources
3. Emotional manipulation
4. Logical inconsistencies
5. Implausible claims

Respond with:
- VERDICT: FAKE or REAL
- CONFIDENCE: percentage (e.g., 85%)
- REASON: one sentence explanation

Keep your response brief and focused.`,
    inputVariables: ["title", "content"],
});

/**
 * Classifies articles by asking a language model and interpreting its free-text answer.
 */
@injectable()
export class LLMClassifier implements IClassifier {
    constructor(
        @inject("ITextCompletionProvider") private readonly provider: ITextCompletionProvider,
        @inject(ResponseParser) private readonly parser: ResponseParser,
        @inject("ClassifierConfig") private readonly config: ClassifierConfig,
        @inject("ILogger") private readonly logger: ILogger,
    ) { }

    /**
     * Classifies an article as fake or real.
     * @param title - The headline, may be empty.
     * @param content - The article body; only the first `prompt.maxContentLength` characters are sent.
     * @throws InferenceUnavailableError if the inference endpoint cannot be reached.
     */
    async classify(title: string, content: string): Promise<ClassificationResult> {
        const prompt = await this.buildPrompt(title, content);
        const reply = await this.provider.complete(prompt);

        const result = this.parser.parse(reply);
        this.logger.info(`${result.label} with confidence ${result.confidence}`, { title });
        return result;
    }

    buildPrompt(title: string, content: string): Promise<string> {
        return DETECTION_PROMPT.format({
            title: title.trim(),
            content: content.slice(0, this.config.prompt.maxContentLength),
        });
    }
}
