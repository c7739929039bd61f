import { ClassifierFactory } from "../../src/Classifier/ClassifierFactory";
import { ClassificationLabel } from "../../src/Classifier/ClassificationResult";
import { InferenceUnavailableError } from "../../src/Classifier/errors/ClassifierErrors";
import { ClassifierConfig } from "../../src/Config/config";
import { createMockLogger } from "../mocks/mockLogger";
import { createTestConfig } from "../mocks/mockConfig";
import { FakeOllamaServer, startFakeOllamaServer, writeGenerateReply } from "../mocks/fakeOllamaServer";

describe("Ollama completion provider over HTTP", () => {
    const factory = new ClassifierFactory(createMockLogger());
    let server: FakeOllamaServer | undefined;

    const configFor = (url: string, timeoutMs?: number): ClassifierConfig => {
        const config = createTestConfig();
        return { ...config, ollama: { ...config.ollama, url, timeoutMs } };
    };

    afterEach(async () => {
        await server?.close();
        server = undefined;
    });

    it("should post the model, prompt and options to /api/generate", async () => {
        server = await startFakeOllamaServer((_request, response) => writeGenerateReply(response, "VERDICT: REAL\nCONFIDENCE: 80%"));
        const provider = factory.createOllamaProvider(configFor(server.url));

        await expect(provider.complete("hi")).resolves.toBe("VERDICT: REAL\nCONFIDENCE: 80%");

        expect(server.requests).toHaveLength(1);
        const [request] = server.requests;
        expect(request.method).toBe("POST");
        expect(request.url).toBe("/api/generate");
        expect(JSON.parse(request.body)).toMatchObject({
            model: "llama3.2",
            prompt: "hi",
            options: { temperature: 0.1, num_predict: 150 },
        });
    });

    it("should classify an article end to end", async () => {
        server = await startFakeOllamaServer((_request, response) => writeGenerateReply(response, "VERDICT: FAKE\nCONFIDENCE: 85%"));
        const classifier = factory.createLLMClassifier(configFor(server.url));

        await expect(classifier.classify("Headline", "Body")).resolves.toEqual({
            label: ClassificationLabel.FAKE,
            confidence: 0.85,
        });
        expect(JSON.parse(server.requests[0].body).prompt).toContain("TITLE: Headline\n");
    });

    it("should report a non-success status as InferenceUnavailableError without retrying", async () => {
        server = await startFakeOllamaServer((_request, response) => {
            response.writeHead(500, { "Content-Type": "application/json" });
            response.end(JSON.stringify({ error: "model 'llama3.2' not found" }));
        });
        const provider = factory.createOllamaProvider(configFor(server.url));

        const failure = provider.complete("hi");

        await expect(failure).rejects.toBeInstanceOf(InferenceUnavailableError);
        await expect(failure).rejects.toMatchObject({ endpoint: `${server.url}/api/generate` });
        expect(server.requests).toHaveLength(1);
    });

    it("should give up on a server that never answers once the timeout expires", async () => {
        server = await startFakeOllamaServer(() => undefined);
        const provider = factory.createOllamaProvider(configFor(server.url, 200));

        const failure = provider.complete("hi");

        await expect(failure).rejects.toBeInstanceOf(InferenceUnavailableError);
        await expect(failure).rejects.toThrow("No response from inference endpoint within 200ms");
    });
});
