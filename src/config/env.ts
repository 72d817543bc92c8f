/**
 * GitHub Telegram Relay - Environment Configuration and Validation
 *
 * Builds the single {@link AppConfig} object the rest of the application
 * receives. Nothing outside this module reads `process.env`.
 *
 * Required Environment Variables:
 * - TELEGRAM_BOT_TOKEN: Telegram Bot API authentication token (from @BotFather)
 * - GITHUB_TOKEN: GitHub personal access token used for API lookups
 * - GITHUB_USERNAME: GitHub account the token belongs to
 *
 * Optional Environment Variables:
 * - GITHUB_WEBHOOK_SECRET: Shared secret for X-Hub-Signature-256 verification (empty disables it)
 * - ALLOWED_CHAT_IDS: Comma-separated Telegram chat IDs (empty allows every chat)
 * - WEBHOOK_HOST / WEBHOOK_PORT: Listener for GitHub webhook deliveries (0.0.0.0:8000)
 * - WEB_HOST / WEB_PORT: Listener for the status API (0.0.0.0:5000)
 * - RATE_LIMIT_REQUESTS / RATE_LIMIT_WINDOW: Commands allowed per chat per window in seconds (10 / 60)
 * - NOTIFY_ON_PUSH, NOTIFY_ON_ISSUES, NOTIFY_ON_PULL_REQUESTS, NOTIFY_ON_RELEASES: Event toggles (true)
 * - NODE_ENV: Runtime environment (development/production)
 * - LOG_LEVEL: Startup log verbosity override (debug/info/warn/error)
 *
 * @since 2025
 */

import { LogEngine } from '@wgtechlabs/log-engine';
import { z } from 'zod';

/**
 * Per-event notification toggles. `ping` is not listed: it is always relayed.
 */
export interface NotifyFlags {
    push: boolean;
    issues: boolean;
    pullRequests: boolean;
    releases: boolean;
}

export interface RateLimitSettings {
    requests: number;
    windowSeconds: number;
}

export interface AppConfig {
    readonly telegramToken: string;
    readonly githubToken: string;
    readonly githubUsername: string;
    readonly webhookSecret: string;
    readonly allowedChatIds: ReadonlySet<number>;
    readonly webhookHost: string;
    readonly webhookPort: number;
    readonly webHost: string;
    readonly webPort: number;
    readonly rateLimit: Readonly<RateLimitSettings>;
    readonly notifications: Readonly<NotifyFlags>;
    readonly environment: string;
    readonly logLevel: string | undefined;
}

export class ConfigurationError extends Error {
    constructor(readonly issues: string[]) {
        super(`Configuration errors:\n${issues.map(issue => `- ${issue}`).join('\n')}`);
        this.name = 'ConfigurationError';
    }
}

/**
 * Environment variable help information
 */
const ENV_VAR_HELP: Record<string, string> = {
    'TELEGRAM_BOT_TOKEN': 'Message @BotFather on Telegram, create a new bot with /newbot',
    'GITHUB_TOKEN': 'GitHub → Settings → Developer settings → Personal access tokens',
    'GITHUB_USERNAME': 'The GitHub account that owns GITHUB_TOKEN',
    'ALLOWED_CHAT_IDS': 'Message @userinfobot on Telegram to get a chat ID (comma-separated list)'
};

const TOKEN_PLACEHOLDERS = [
    'your_token_here',
    'your_telegram_bot_token',
    'bot_token_from_botfather',
    'your_github_token',
    'replace_with_your_token',
    'your_secret_here'
];

const requiredString = (name: string) =>
    z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

/** Treats a blank value (`PORT=` in .env) as unset so the default applies */
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess(value => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const port = (fallback: number) =>
    blankAsUnset(z.coerce.number().int().min(1).max(65535).default(fallback));

const flag = z
    .string()
    .default('true')
    .transform(value => value.trim().toLowerCase() === 'true');

const envSchema = z.object({
    TELEGRAM_BOT_TOKEN: requiredString('TELEGRAM_BOT_TOKEN'),
    GITHUB_TOKEN: requiredString('GITHUB_TOKEN'),
    GITHUB_USERNAME: requiredString('GITHUB_USERNAME'),
    GITHUB_WEBHOOK_SECRET: z.string().default(''),
    ALLOWED_CHAT_IDS: z.string().default(''),
    WEBHOOK_HOST: blankAsUnset(z.string().trim().default('0.0.0.0')),
    WEBHOOK_PORT: port(8000),
    WEB_HOST: blankAsUnset(z.string().trim().default('0.0.0.0')),
    WEB_PORT: port(5000),
    RATE_LIMIT_REQUESTS: blankAsUnset(z.coerce.number().int().positive().default(10)),
    RATE_LIMIT_WINDOW: blankAsUnset(z.coerce.number().int().positive().default(60)),
    NOTIFY_ON_PUSH: flag,
    NOTIFY_ON_ISSUES: flag,
    NOTIFY_ON_PULL_REQUESTS: flag,
    NOTIFY_ON_RELEASES: flag,
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: blankAsUnset(z.enum(['debug', 'info', 'warn', 'error']).optional())
});

/**
 * Parses a comma-separated list of Telegram chat IDs.
 *
 * Group chats have negative IDs, so a leading minus sign is accepted.
 *
 * @throws ConfigurationError if any entry is not an integer
 */
export function parseChatIds(raw: string): number[] {
    const entries = raw.split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0);

    const invalid = entries.filter(entry => !/^-?\d+$/.test(entry));
    if (invalid.length > 0) {
        throw new ConfigurationError([
            `ALLOWED_CHAT_IDS contains invalid chat IDs: ${invalid.join(', ')}`
        ]);
    }

    return entries.map(entry => parseInt(entry, 10));
}

/**
 * Rejects tokens that still hold a value copied from `.env.example`.
 */
function findPlaceholderTokens(values: Record<string, string>): string[] {
    const issues: string[] = [];

    for (const [name, value] of Object.entries(values)) {
        const lower = value.toLowerCase();
        if (TOKEN_PLACEHOLDERS.some(placeholder => lower.includes(placeholder))) {
            issues.push(`${name} contains a placeholder value. Please replace it with a real credential.`);
        }
    }

    return issues;
}

/**
 * Reads and validates the environment, returning an immutable configuration.
 *
 * @throws ConfigurationError listing every problem found
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => {
                const field = issue.path.join('.');
                return issue.message.includes(field) ? issue.message : `${field}: ${issue.message}`;
            })
        );
    }

    const values = parsed.data;
    const placeholderIssues = findPlaceholderTokens({
        TELEGRAM_BOT_TOKEN: values.TELEGRAM_BOT_TOKEN,
        GITHUB_TOKEN: values.GITHUB_TOKEN
    });

    // Telegram bot tokens follow the pattern: numeric_bot_id:alphanumeric_string
    if (!/^\d{6,10}:[A-Za-z0-9_-]{35,}$/.test(values.TELEGRAM_BOT_TOKEN)) {
        placeholderIssues.push(
            'TELEGRAM_BOT_TOKEN format is invalid. Expected format: NNNNNN:XXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXX'
        );
    }

    if (placeholderIssues.length > 0) {
        throw new ConfigurationError(placeholderIssues);
    }

    return Object.freeze({
        telegramToken: values.TELEGRAM_BOT_TOKEN,
        githubToken: values.GITHUB_TOKEN,
        githubUsername: values.GITHUB_USERNAME,
        webhookSecret: values.GITHUB_WEBHOOK_SECRET,
        allowedChatIds: new Set(parseChatIds(values.ALLOWED_CHAT_IDS)),
        webhookHost: values.WEBHOOK_HOST,
        webhookPort: values.WEBHOOK_PORT,
        webHost: values.WEB_HOST,
        webPort: values.WEB_PORT,
        rateLimit: Object.freeze({
            requests: values.RATE_LIMIT_REQUESTS,
            windowSeconds: values.RATE_LIMIT_WINDOW
        }),
        notifications: Object.freeze({
            push: values.NOTIFY_ON_PUSH,
            issues: values.NOTIFY_ON_ISSUES,
            pullRequests: values.NOTIFY_ON_PULL_REQUESTS,
            releases: values.NOTIFY_ON_RELEASES
        }),
        environment: values.NODE_ENV,
        logLevel: values.LOG_LEVEL
    });
}

/**
 * Validates the environment at startup.
 *
 * Logs every problem with setup hints and terminates the process if validation
 * fails; otherwise logs a short summary and returns the configuration.
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): AppConfig {
    let config: AppConfig;

    try {
        config = loadConfig(env);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }

        LogEngine.error('❌ Environment configuration error:', {
            issues: error.issues,
            totalIssues: error.issues.length
        });

        const mentioned = Object.keys(ENV_VAR_HELP)
            .filter(varName => error.issues.some(issue => issue.includes(varName)));
        mentioned.forEach(varName => {
            LogEngine.error(`   ❌ ${varName}`);
            LogEngine.error(`      How to get: ${ENV_VAR_HELP[varName]}`);
        });

        LogEngine.error('\n📝 Setup Instructions:');
        LogEngine.error('   1. Copy .env.example to .env: cp .env.example .env');
        LogEngine.error('   2. Edit .env and replace placeholder values with actual credentials');
        LogEngine.error('   3. Restart the bot');
        process.exit(1);
    }

    if (!config.webhookSecret) {
        LogEngine.warn('⚠️  GITHUB_WEBHOOK_SECRET not configured - webhook signatures will not be verified');
    }

    if (config.allowedChatIds.size === 0) {
        LogEngine.warn('⚠️  ALLOWED_CHAT_IDS is empty - every chat may use the bot and notifications have no recipients');
    }

    LogEngine.info('✅ Environment configuration validated successfully', {
        allowedChats: config.allowedChatIds.size,
        // Don't log actual chat IDs or secrets
        verifiesSignatures: config.webhookSecret.length > 0,
        rateLimit: `${config.rateLimit.requests}/${config.rateLimit.windowSeconds}s`
    });
    LogEngine.info(`🚀 Running in ${config.environment} mode`);

    return config;
}

/**
 * Returns the URL GitHub should deliver webhooks to.
 */
export function getWebhookUrl(config: AppConfig): string {
    return `http://${config.webhookHost}:${config.webhookPort}/webhook`;
}

/**
 * Check if running in production
 */
export function isProduction(config: AppConfig): boolean {
    return config.environment === 'production';
}
