import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { formatIssues } from '../utils/zodIssues';

dotenv.config({
    quiet: true,
});

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
const envSchema = z.object({
    NODE_ENV: z.string().default('production'),
    RSS_PREVIEW_URL: z.string().url().default('http://localhost:8080/api/rss/preview'),
    WIDGET_USER_AGENT: z.string().min(1).default('E-Paper-Dashboard/1.0'),
    RSS_USER_AGENT: z.string().min(1).default('E-Paper-Dashboard/1.0 RSS Reader'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = envSchema.safeParse(source);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid environment: ${formatIssues(parsed.error.issues, 'env')}`,
            parsed.error.issues
        );
    }
    return parsed.data;
}

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_FEED_ITEMS = 10;
