import IClassifier from "../src/Classifier/IClassifier";
import { ClassificationLabel } from "../src/Classifier/ClassificationResult";
import { InferenceUnavailableError } from "../src/Classifier/errors/ClassifierErrors";
import { createProgram, formatResult, SAMPLE_ARTICLES } from "../src/cli";
import { createMockLogger } from "./mocks/mockLogger";

describe("news-verdict CLI", () => {
    let classifier: jest.Mocked<IClassifier>;
    let fallback: jest.Mocked<IClassifier>;
    let logger: ReturnType<typeof createMockLogger>;
    let output: string[];
    let readFile: jest.Mock<Promise<string>, [string]>;

    const run = (...args: string[]) => {
        const program = createProgram({ classifier, fallback, logger, write: line => output.push(line), readFile });
        program.exitOverride();
        return program.parseAsync(args, { from: "user" });
    };

    beforeEach(() => {
        classifier = { classify: jest.fn().mockResolvedValue({ label: ClassificationLabel.FAKE, confidence: 0.9 }) };
        fallback = { classify: jest.fn().mockResolvedValue({ label: ClassificationLabel.REAL, confidence: 0.5 }) };
        logger = createMockLogger();
        output = [];
        readFile = jest.fn().mockResolvedValue("Body from file");
    });

    it("should classify an article given inline", async () => {
        await run("classify", "--title", "Headline", "--content", "Body text");

        expect(classifier.classify).toHaveBeenCalledWith("Headline", "Body text");
        expect(output).toEqual(["FAKE (confidence 0.90)"]);
    });

    it("should print JSON when asked", async () => {
        await run("classify", "--content", "Body text", "--json");

        expect(classifier.classify).toHaveBeenCalledWith("", "Body text");
        expect(output).toEqual(['{"label":"FAKE","confidence":0.9}']);
    });

    it("should read the content from a file", async () => {
        await run("classify", "-t", "Headline", "-f", "article.txt");

        expect(readFile).toHaveBeenCalledWith("article.txt");
        expect(classifier.classify).toHaveBeenCalledWith("Headline", "Body from file");
    });

    it("should require some content", async () => {
        await expect(run("classify", "--title", "Headline")).rejects.toThrow("Either --content or --file is required");
        expect(classifier.classify).not.toHaveBeenCalled();
    });

    it("should propagate InferenceUnavailableError when no fallback is requested", async () => {
        classifier.classify.mockRejectedValue(new InferenceUnavailableError("http://localhost:11434/api/generate", new Error("down")));

        await expect(run("classify", "--content", "Body")).rejects.toBeInstanceOf(InferenceUnavailableError);
        expect(fallback.classify).not.toHaveBeenCalled();
        expect(output).toEqual([]);
    });

    it("should use the keyword heuristic when the fallback is requested", async () => {
        classifier.classify.mockRejectedValue(new InferenceUnavailableError("http://localhost:11434/api/generate", new Error("down")));

        await run("classify", "--content", "Body", "--fallback");

        expect(fallback.classify).toHaveBeenCalledWith("", "Body");
        expect(logger.warn).toHaveBeenCalledWith(
            "Falling back to keyword heuristic: Inference Unavailable: http://localhost:11434/api/generate: down"
        );
        expect(output).toEqual(["REAL (confidence 0.50)"]);
    });

    it("should not fall back on other errors", async () => {
        classifier.classify.mockRejectedValue(new Error("boom"));

        await expect(run("classify", "--content", "Body", "--fallback")).rejects.toThrow("boom");
        expect(fallback.classify).not.toHaveBeenCalled();
    });

    it("should classify every sample article in the demo", async () => {
        await run("demo");

        expect(classifier.classify).toHaveBeenCalledTimes(SAMPLE_ARTICLES.length);
        expect(output).toEqual([
            `[Obvious fake] ${SAMPLE_ARTICLES[0].title}`,
            "  FAKE (confidence 0.90)",
            `[Likely real] ${SAMPLE_ARTICLES[1].title}`,
            "  FAKE (confidence 0.90)",
        ]);
    });

    it("should format results", () => {
        expect(formatResult({ label: ClassificationLabel.UNKNOWN, confidence: 0.5 })).toBe("UNKNOWN (confidence 0.50)");
        expect(formatResult({ label: ClassificationLabel.REAL, confidence: 0.85 }, true)).toBe('{"label":"REAL","confidence":0.85}');
    });
});
