import fs from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Feed } from './types.js';

const feedSchema = z.object({
    name: z.string().min(1, 'feed name is required'),
    url: z.string().url('feed url must be an absolute URL'),
    max_items: z.number().int().positive().default(5),
    category: z.string().min(1).default('vendor'),
});

const feedFileSchema = z.object({
    feeds: z.array(feedSchema).default([]),
});

function describeIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Loads the feed list from a YAML file, in file order.
 * A missing file throws the underlying fs error; bad content throws ConfigError.
 */
export function loadFeeds(cfgPath: string): Feed[] {
    const raw = fs.readFileSync(cfgPath, 'utf-8');
    let data: unknown;
    try {
        data = yaml.load(raw);
    } catch (e) {
        throw new ConfigError(`Cannot parse feed config ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const parsed = feedFileSchema.safeParse(data ?? {});
    if (!parsed.success) {
        throw new ConfigError(`Invalid feed config ${cfgPath}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.feeds.map((f) => ({ name: f.name, url: f.url, maxItems: f.max_items, category: f.category }));
}

export type MailConfig = {
    host: string;
    port: number;
    user: string;
    pass: string;
    from: string;
    to: string[];
};

// Empty strings are treated as unset.
const optionalVar = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

const mailEnvSchema = z.object({
    SMTP_HOST: optionalVar,
    SMTP_PORT: optionalVar,
    SMTP_USER: optionalVar,
    SMTP_PASS: optionalVar,
    EMAIL_FROM: optionalVar,
    EMAIL_TO: optionalVar,
});

/**
 * Reads the mail relay settings from the environment.
 * Throws ConfigError(MAIL_CONFIG_MISSING) listing every missing variable; an
 * EMAIL_TO without any address counts as missing. A bad SMTP_PORT is CONFIG_INVALID.
 */
export function loadMailConfig(env: NodeJS.ProcessEnv = process.env): MailConfig {
    const vars = mailEnvSchema.parse(env);
    const from = vars.EMAIL_FROM ?? vars.SMTP_USER;
    const missing: string[] = [];
    if (!vars.SMTP_HOST) missing.push('SMTP_HOST');
    if (!vars.SMTP_USER) missing.push('SMTP_USER');
    if (!vars.SMTP_PASS) missing.push('SMTP_PASS');
    if (!from) missing.push('EMAIL_FROM');
    const to = (vars.EMAIL_TO ?? '').split(',').map((s) => s.trim()).filter((s) => s.length > 0);
    if (to.length === 0) missing.push('EMAIL_TO');
    if (!vars.SMTP_HOST || !vars.SMTP_USER || !vars.SMTP_PASS || !from || to.length === 0) {
        throw new ConfigError(`Missing SMTP or email configuration environment variables: ${missing.join(', ')}`, 'MAIL_CONFIG_MISSING');
    }

    const port = Number(vars.SMTP_PORT ?? '587');
    if (!Number.isInteger(port) || port <= 0) {
        throw new ConfigError(`SMTP_PORT must be a positive integer, got "${vars.SMTP_PORT}"`, 'CONFIG_INVALID');
    }

    return { host: vars.SMTP_HOST, port, user: vars.SMTP_USER, pass: vars.SMTP_PASS, from, to };
}
