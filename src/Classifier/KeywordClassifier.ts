import { injectable } from "tsyringe";
import IClassifier from "./IClassifier";
import { ClassificationLabel, ClassificationResult } from "./ClassificationResult";

/**
 * Offline heuristic: counts sensationalist keywords. Used when the caller opts into a
 * fallback after the inference endpoint is unavailable.
 */
@injectable()
export class KeywordClassifier implements IClassifier {
    private static keywords = [
        "shocking",
        "unbelievable",
        "miracle",
        "secret",
        "conspiracy"
    ];

    async classify(title: string, content: string): Promise<ClassificationResult> {
        const text = `${title} ${content}`.toLowerCase();
        const hits = KeywordClassifier.keywords.filter(keyword => text.includes(keyword)).length;

        return {
            label: hits >= 2 ? ClassificationLabel.FAKE : ClassificationLabel.REAL,
            // Rounded so 0.5 + 3 * 0.1 reads as 0.8 rather than 0.8000000000000002.
            confidence: Math.round(Math.min(0.5 + hits * 0.1, 0.9) * 100) / 100,
        };
    }
}
