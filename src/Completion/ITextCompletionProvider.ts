/**
 * Anything that turns a prompt into generated text.
 */
export interface ITextCompletionProvider {
    /**
     * @throws InferenceUnavailableError when the backing model cannot be reached.
     */
    complete(prompt: string): Promise<string>;
}
