import { inject, injectable } from "tsyringe";
import { ILogger } from "../lib/logger/ILogger";
import { ClassifierConfig } from "../Config/config";
import { ClassificationLabel, ClassificationResult } from "./ClassificationResult";

const VERDICT_MARKER = /\b(?:verdict|classification)\s*[:\-]?[\s*_]*(?:fake|real)\b/i;
const CONFIDENCE_LABEL = /\bconfidence(?:\s+(?:level|score))?\s*(?::|=|of|is|at)?[\s*_]*/gi;
const CONFIDENCE_SUFFIX = /^\s*(?:confident|confidence|certain|certainty|sure)\b/i;
// A standalone number, not part of a word, version string or thousands-separated figure.
const NUMBER_TOKEN = /(?<![\w.,])(\d+(?:\.\d+)?|\.\d+)(?![\w]|[.,]\d)(\s*(?:%|percent\b))?/gi;

interface LabelMatch {
    label: ClassificationLabel;
    /** Index just past the text that decided the label, when one did. */
    endIndex?: number;
}

interface NumberToken {
    index: number;
    endIndex: number;
    value: number;
}

/**
 * Interprets a free-text model reply as a fake/real verdict and a confidence.
 *
 * Confidence is read from the first usable number, looking in turn at a
 * `confidence:` label, a number directly before "confident"/"certain"/"sure",
 * the first number after the verdict keyword, and finally the first number anywhere.
 * Percentages are divided by 100, bare numbers in (1, 100] are read as percentages,
 * and anything larger is not a confidence.
 */
@injectable()
export class ResponseParser {
    private readonly defaultConfidence: number;

    constructor(
        @inject("ILogger") private readonly logger: ILogger,
        @inject("ClassifierConfig") config: ClassifierConfig,
    ) {
        this.defaultConfidence = clamp(config.parsing.defaultConfidence);
    }

    parse(reply: string): ClassificationResult {
        try {
            const text = typeof reply === "string" ? reply : "";
            const labelMatch = this.detectLabel(text);
            const confidence = this.detectConfidence(text, labelMatch.endIndex);

            if (labelMatch.label === ClassificationLabel.UNKNOWN) {
                this.logger.warn("Reply does not state a clear verdict", { reply: text.slice(0, 200) });
            }
            if (confidence === undefined) {
                this.logger.warn(`Reply has no confidence value, using ${this.defaultConfidence}`);
            }

            return {
                label: labelMatch.label,
                confidence: confidence ?? this.defaultConfidence,
            };
        } catch (error) {
            this.logger.error("Failed to parse reply", { error: error instanceof Error ? error.message : String(error) });
            return { label: ClassificationLabel.UNKNOWN, confidence: this.defaultConfidence };
        }
    }

    /**
     * A reply mentioning both keywords, or neither, is UNKNOWN. A `verdict:` line only
     * moves the position confidence is searched from.
     */
    private detectLabel(text: string): LabelMatch {
        const lower = text.toLowerCase();
        const fakeAt = lower.indexOf("fake");
        const realAt = lower.indexOf("real");
        if ((fakeAt >= 0) === (realAt >= 0)) {
            return { label: ClassificationLabel.UNKNOWN };
        }

        const [label, keyword, keywordAt] = fakeAt >= 0
            ? [ClassificationLabel.FAKE, "fake", fakeAt] as const
            : [ClassificationLabel.REAL, "real", realAt] as const;

        const marker = VERDICT_MARKER.exec(text);
        return {
            label,
            endIndex: marker ? marker.index + marker[0].length : keywordAt + keyword.length,
        };
    }

    private detectConfidence(text: string, keywordEnd?: number): number | undefined {
        const tokens = numberTokens(text);
        if (tokens.length === 0) {
            return undefined;
        }

        for (const label of text.matchAll(CONFIDENCE_LABEL)) {
            const start = (label.index ?? 0) + label[0].length;
            const token = tokens.find(t => t.index === start);
            if (token) {
                return token.value;
            }
        }

        const beforeSuffix = tokens.find(t => CONFIDENCE_SUFFIX.test(text.slice(t.endIndex)));
        if (beforeSuffix) {
            return beforeSuffix.value;
        }

        if (keywordEnd !== undefined) {
            const afterKeyword = tokens.find(t => t.index >= keywordEnd);
            if (afterKeyword) {
                return afterKeyword.value;
            }
        }

        return tokens[0].value;
    }
}

/**
 * Every number in the text that can stand for a confidence, already scaled to [0, 1].
 */
function numberTokens(text: string): NumberToken[] {
    const tokens: NumberToken[] = [];
    for (const match of text.matchAll(NUMBER_TOKEN)) {
        const raw = Number.parseFloat(match[1]);
        const isPercent = match[2] !== undefined;
        const value = toConfidence(raw, isPercent);
        if (value === undefined) {
            continue;
        }
        const index = match.index ?? 0;
        tokens.push({ index, endIndex: index + match[0].length, value });
    }
    return tokens;
}

function toConfidence(raw: number, isPercent: boolean): number | undefined {
    if (!Number.isFinite(raw) || raw > 100) {
        return undefined;
    }
    if (isPercent || raw > 1) {
        return clamp(raw / 100);
    }
    return clamp(raw);
}

function clamp(value: number): number {
    return Math.min(1, Math.max(0, value));
}
