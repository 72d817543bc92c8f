/**
 * Command Parsing
 *
 * Maps incoming message text onto a closed set of command kinds. Only the
 * first whitespace-delimited token decides the command: it is lower-cased and
 * any `@botname` suffix (used in group chats) is dropped. Anything else,
 * including plain text without a leading slash, is `unknown`.
 */

export const COMMAND_KINDS = [
    'start',
    'help',
    'profile',
    'repos',
    'repo',
    'commits',
    'issues',
    'search',
    'status',
    'watch',
    'unwatch',
    'watching'
] as const;

export type CommandKind = typeof COMMAND_KINDS[number];

/** What a command receives besides the Telegram context */
export interface CommandInput {
    /** Whitespace-separated arguments after the command token */
    args: string[];
    /** Everything after the command token, trimmed */
    argText: string;
}

export type ParsedCommand =
    | ({ kind: CommandKind } & CommandInput)
    | ({ kind: 'unknown'; token: string } & CommandInput);

export function parseCommand(text: string): ParsedCommand {
    const trimmed = text.trim();
    const match = /^(\S*)\s*([\s\S]*)$/.exec(trimmed);
    const token = match?.[1] ?? '';
    const argText = (match?.[2] ?? '').trim();
    const args = argText ? argText.split(/\s+/) : [];

    const normalized = token.toLowerCase().split('@')[0] ?? '';
    const kind = normalized.startsWith('/')
        ? COMMAND_KINDS.find(candidate => `/${candidate}` === normalized)
        : undefined;

    if (!kind) {
        return { kind: 'unknown', token, args, argText };
    }
    return { kind, args, argText };
}

export interface RepositoryPath {
    owner: string;
    repo: string;
}

/**
 * Parses `owner/repo`. Both parts must be non-empty and use only the
 * characters GitHub allows in account and repository names.
 */
export function parseRepositoryPath(value: string | undefined): RepositoryPath | null {
    if (!value) {
        return null;
    }

    const separator = value.indexOf('/');
    if (separator <= 0) {
        return null;
    }

    const owner = value.slice(0, separator);
    const repo = value.slice(separator + 1);
    const namePattern = /^[a-zA-Z0-9._-]+$/;

    if (!namePattern.test(owner) || !namePattern.test(repo)) {
        return null;
    }
    return { owner, repo };
}
