export enum ClassificationLabel {
    FAKE = "FAKE",
    REAL = "REAL",
    UNKNOWN = "UNKNOWN",
}

/**
 * An article to classify. The title may be empty.
 */
export interface ClassificationRequest {
    title: string;
    content: string;
}

/**
 * Outcome of a single classification.
 */
export interface ClassificationResult {
    label: ClassificationLabel;
    /**
     * Certainty of the label, always within [0, 1].
     */
    confidence: number;
}
