import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors/ConfigErrors';

dotenv.config();

export interface OllamaConfig {
    url: string;
    model: string;
    temperature: number;
    numPredict: number;
    /** Passed to the model call when set; otherwise the HTTP client's default applies. */
    timeoutMs?: number;
}

export interface ClassifierConfig {
    ollama: OllamaConfig;
    prompt: {
        maxContentLength: number;
    };
    parsing: {
        defaultConfidence: number;
    };
    logging: {
        level: string;
        directory?: string;
    };
}

const envSchema = z.object({
    OLLAMA_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_MODEL: z.string().min(1).default('llama3.2'),
    OLLAMA_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    OLLAMA_NUM_PREDICT: z.coerce.number().int().positive().default(150),
    OLLAMA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(1500),
    DEFAULT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.5),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    LOG_DIR: z.string().min(1).optional(),
});

/**
 * Builds the classifier configuration from environment variables.
 * Empty strings count as unset so that `FOO=` in a .env file falls back to the default.
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClassifierConfig {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(issues.join('; '));
    }

    const vars = parsed.data;
    return {
        ollama: {
            url: vars.OLLAMA_URL.replace(/\/+$/, ''),
            model: vars.OLLAMA_MODEL,
            temperature: vars.OLLAMA_TEMPERATURE,
            numPredict: vars.OLLAMA_NUM_PREDICT,
            timeoutMs: vars.OLLAMA_TIMEOUT_MS,
        },
        prompt: {
            maxContentLength: vars.MAX_CONTENT_LENGTH,
        },
        parsing: {
            defaultConfidence: vars.DEFAULT_CONFIDENCE,
        },
        logging: {
            level: vars.LOG_LEVEL,
            directory: vars.LOG_DIR,
        },
    };
}
