/**
 * Command Policy
 *
 * Textual screening of shell commands before they are spawned. Best-effort:
 * it catches the obvious host-wrecking forms, it is not a shell parser.
 */

import { CorralLogComponent, type Logger } from '@corral/core';
import type { PolicyDecision } from './types.js';

interface PolicyRule {
    pattern: RegExp;
    reason: string;
}

// Checked against the whole command and against each sub-command
const HARD_BLOCK_RULES: readonly PolicyRule[] = [
    {
        pattern:
            /\brm\s+(?:--no-preserve-root\s+)?-[a-z]*(?:r[a-z]*f|f[a-z]*r)[a-z]*\s+(?:--no-preserve-root\s+)?(?:\/\*?|~\/?)(?:\s|$)/i,
        reason: 'recursive force delete of the filesystem root or home directory',
    },
    {
        pattern: /\brm\s+(?:(?:-r|-f|--recursive|--force|--no-preserve-root)\s+){2,}(?:\/\*?|~\/?)(?:\s|$)/i,
        reason: 'recursive force delete of the filesystem root or home directory',
    },
    { pattern: /\bmkfs(?:\.\w+)?\b/i, reason: 'filesystem format (mkfs)' },
    {
        pattern: /\bdd\b[^|;&]*\bof=\/dev\/(?:sd|hd|vd|xvd|nvme|mmcblk|disk)/i,
        reason: 'dd onto a block device',
    },
    {
        pattern: /\bdd\b[^|;&]*\bif=\/dev\/(?:zero|u?random)\b/i,
        reason: 'dd from /dev/zero or /dev/random',
    },
    { pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'fork bomb' },
    {
        pattern: />\s*\/dev\/(?:sd[a-z]|hd[a-z]|vd[a-z]|xvd[a-z]|nvme\d|mmcblk\d|disk\d)/i,
        reason: 'redirection into a disk device',
    },
    { pattern: /\bmv\s+\/\*?\s+\/dev\/null\b/i, reason: 'moving the filesystem root to /dev/null' },
    {
        pattern: /\b(?:curl|wget)\b[^|;&]*\|\s*(?:sudo\s+)?(?:ba|da|k|z)?sh\b/i,
        reason: 'piping a network download into a shell',
    },
    {
        pattern: /\bchmod\s+(?:-R|--recursive)\s+0?777\s+\/(?:\s|$)/i,
        reason: 'recursive chmod 777 of the filesystem root',
    },
];

// Checked against each sub-command, anchored at its start
const PRIVILEGE_PATTERN = /^(?:sudo|su|doas|pkexec)(?:\s|$)/i;

const DESTRUCTIVE_RULES: readonly PolicyRule[] = [
    { pattern: /\brm\s+(?:-\S+\s+)*-[a-z]*(?:r[a-z]*f|f[a-z]*r)/i, reason: 'recursive force delete' },
    { pattern: /\bchmod\s+(?:-\S+\s+)*0?777\b/i, reason: 'world-writable permissions (chmod 777)' },
    { pattern: /\bchown\b/i, reason: 'ownership change (chown)' },
    { pattern: /\bdd\s/i, reason: 'raw block copy (dd)' },
    { pattern: /\bfdisk\b/i, reason: 'disk partitioning (fdisk)' },
    { pattern: /\b(?:shutdown|reboot|halt|poweroff)\b/i, reason: 'host shutdown or reboot' },
    { pattern: /\binit\s+[06]\b/i, reason: 'runlevel change (init 0/6)' },
    { pattern: /\bgit\s+reset\b.*\s--hard\b/i, reason: 'discards uncommitted work (git reset --hard)' },
    { pattern: /\bgit\s+clean\b.*\s-[a-z]*f/i, reason: 'deletes untracked files (git clean -f)' },
    {
        pattern: />\s*\/dev\/(?!null\b|stdout\b|stderr\b|tty\b|fd\/)/i,
        reason: 'redirection into a device under /dev',
    },
];

/**
 * Split on `&&`, `||`, `;` and `|`, dropping control-flow keywords and
 * grouping braces so `if x; then sudo y; fi` still exposes `sudo y`.
 */
export function splitSubCommands(command: string): string[] {
    return command
        .split(/\s*(?:&&|\|\||;|\||\n)\s*/)
        .map((part) =>
            part
                .trim()
                .replace(/^(?:then|do|else|if|while|until)\b\s*/, '')
                .replace(/^[{(]\s*/, '')
                .trim()
        )
        .filter((part) => part.length > 0);
}

/**
 * Bare paths that name the filesystem root: `/`, `//`, `/.`, `/./`, `/..`
 */
const ROOT_SPELLING = /^\/[/.]*$/;
const ROOT_GLOB_SPELLING = /^\/[/.]*\*$/;

/**
 * Canonical word form of one sub-command for screening: quotes removed from
 * single words, the `--` end-of-options marker dropped and root spellings
 * collapsed, so `rm -rf -- "/."` screens the same as `rm -rf /`.
 */
export function normalizeForScreening(subCommand: string): string {
    const words = subCommand.match(/"[^"]*"|'[^']*'|\S+/g) ?? [];
    return words
        // A quoted phrase stays one quoted word; it is an argument, not a command
        .map((word) => (/\s/.test(word) ? word : word.replace(/["']/g, '')))
        .filter((word) => word !== '--')
        .map((word) => {
            if (ROOT_SPELLING.test(word)) {
                return '/';
            }
            return ROOT_GLOB_SPELLING.test(word) ? '/*' : word;
        })
        .join(' ');
}

export interface CommandPolicyOptions {
    /** Case-insensitive substrings that block a command outright */
    blockedCommands: readonly string[];
}

export class CommandPolicy {
    private readonly logger: Logger;
    private readonly blockedCommands: readonly string[];

    constructor(options: CommandPolicyOptions, logger: Logger) {
        this.blockedCommands = options.blockedCommands.map((entry) => entry.toLowerCase());
        this.logger = logger.createChild(CorralLogComponent.POLICY);
    }

    /**
     * Hard blocks win over warnings; the first warning found is reported.
     */
    classify(command: string): PolicyDecision {
        const subCommands = splitSubCommands(command);
        const normalized = subCommands.map(normalizeForScreening);
        const candidates = [command, ...subCommands, ...normalized];

        for (const rule of HARD_BLOCK_RULES) {
            if (candidates.some((candidate) => rule.pattern.test(candidate))) {
                this.logger.warn(`Blocked command (${rule.reason}): ${command}`);
                return { kind: 'blocked', reason: rule.reason };
            }
        }

        const lowered = command.toLowerCase();
        const configured = this.blockedCommands.find((entry) => lowered.includes(entry));
        if (configured !== undefined) {
            const reason = `matches blocked command "${configured}"`;
            this.logger.warn(`Blocked command (${reason}): ${command}`);
            return { kind: 'blocked', reason };
        }

        const privileged = subCommands.find((sub) => PRIVILEGE_PATTERN.test(sub));
        if (privileged !== undefined) {
            return this.warn(command, `privilege escalation: ${privileged.split(/\s+/)[0] ?? ''}`);
        }

        for (const rule of DESTRUCTIVE_RULES) {
            if (candidates.some((candidate) => rule.pattern.test(candidate))) {
                return this.warn(command, rule.reason);
            }
        }

        return { kind: 'allowed' };
    }

    private warn(command: string, reason: string): PolicyDecision {
        this.logger.info(`Flagged command (${reason}): ${command}`);
        return { kind: 'warn', reason };
    }
}
