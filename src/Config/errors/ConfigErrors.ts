export class ConfigurationError extends Error {
    constructor(message: string) {
        super(`Configuration Error: ${message}`);
        this.name = this.constructor.name;
    }
}
