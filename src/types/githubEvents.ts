/**
 * GitHub Webhook Payload Schemas
 *
 * Only the fields the notification templates read are declared; anything else
 * GitHub sends is ignored. Absent or null fields fall back to display defaults,
 * while a field of the wrong type fails the parse.
 */
import { z } from 'zod';

const text = (fallback: string) =>
    z.string().nullish().transform(value => value ?? fallback);

const count = z.number().int().nullish().transform(value => value ?? 0);

/** An optional nested object whose own fields all carry defaults */
const section = <T extends z.ZodRawShape>(shape: T) =>
    z.preprocess(value => value ?? {}, z.object(shape));

const repository = section({
    full_name: text('Unknown'),
    html_url: text('')
});

export const GITHUB_EVENT_TYPES = ['push', 'issues', 'pull_request', 'release', 'ping'] as const;
export type GitHubEventType = typeof GITHUB_EVENT_TYPES[number];

export const pushEventSchema = z.object({
    ref: text(''),
    repository,
    pusher: section({ name: text('Unknown') }),
    commits: z.array(z.object({
        id: text(''),
        message: text('No message'),
        url: text(''),
        author: section({ name: text('Unknown') })
    })).nullish().transform(value => value ?? [])
});

export const issuesEventSchema = z.object({
    action: text('unknown'),
    repository,
    issue: section({
        number: count,
        title: text('No title'),
        html_url: text(''),
        user: section({ login: text('Unknown') })
    })
});

export const pullRequestEventSchema = z.object({
    action: text('unknown'),
    repository,
    pull_request: section({
        number: count,
        title: text('No title'),
        html_url: text(''),
        user: section({ login: text('Unknown') })
    })
});

export const releaseEventSchema = z.object({
    action: text('unknown'),
    repository,
    release: section({
        name: text('No name'),
        tag_name: text('Unknown'),
        html_url: text(''),
        author: section({ login: text('Unknown') })
    })
});

export const pingEventSchema = z.object({
    zen: text(''),
    repository
});

export type PushEvent = z.output<typeof pushEventSchema>;
export type IssuesEvent = z.output<typeof issuesEventSchema>;
export type PullRequestEvent = z.output<typeof pullRequestEventSchema>;
export type ReleaseEvent = z.output<typeof releaseEventSchema>;
export type PingEvent = z.output<typeof pingEventSchema>;

export { text, count, section };
