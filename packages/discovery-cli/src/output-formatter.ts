/**
 * Output Formatter
 *
 * Renders discovery results for the terminal: run summary, profiles table
 * and discovery tree. Functions return strings; callers decide where they go.
 */

import {
    DEFAULT_DISPLAY_MAX_ROWS,
    DEFAULT_DISPLAY_TREE_CHILDREN,
    DEFAULT_DISPLAY_TREE_DEPTH,
    DEFAULT_DISPLAY_TREE_ROOTS,
    buildChildrenMap,
    getCurrentPosition,
    getDisplayName,
    getGeo,
    getStringField,
} from '@profile-graph/discovery-core';
import type { DiscoveryReport, ProfileRecord } from '@profile-graph/discovery-core';
import { bold, cyan, gray, green, yellow } from './logger';

const FAILED_USERNAMES_SHOWN = 5;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Cut text longer than `max` to `keep` characters plus "..."
 */
export function truncate(text: string, max: number, keep: number = max - 3): string {
    return text.length > max ? `${text.slice(0, keep)}...` : text;
}

/**
 * Show the first 8 and last 6 characters of a key
 */
export function maskApiKey(apiKey: string): string {
    return apiKey.length > 14 ? `${apiKey.slice(0, 8)}...${apiKey.slice(-6)}` : '***...***';
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) {
        return `${ms}ms`;
    }
    const seconds = ms / 1000;
    if (seconds < 60) {
        return `${seconds.toFixed(1)}s`;
    }
    const minutes = Math.floor(seconds / 60);
    const remaining = Math.round(seconds % 60);
    return `${minutes}m ${remaining}s`;
}

// ============================================================================
// Summary
// ============================================================================

export function formatSummary(report: DiscoveryReport): string {
    const rows: Array<[string, number]> = [
        ['Total Profiles Discovered', report.totalDiscovered],
        ['Unique URNs Found', report.uniqueUrns],
        ['Failed Usernames', report.failedUsernames.length],
        ['Failed URNs', report.failedUrns.length],
    ];
    const labelWidth = Math.max(...rows.map(([label]) => label.length));

    const lines = [bold(cyan('Discovery Summary'))];
    for (const [label, value] of rows) {
        lines.push(`  ${cyan(label.padEnd(labelWidth))}  ${green(String(value))}`);
    }

    if (report.failedUsernames.length > 0) {
        const shown = report.failedUsernames.slice(0, FAILED_USERNAMES_SHOWN);
        lines.push('', yellow(`Failed usernames: ${shown.join(', ')}`));
        const hidden = report.failedUsernames.length - shown.length;
        if (hidden > 0) {
            lines.push(gray(`... and ${hidden} more`));
        }
    }

    return lines.join('\n');
}

// ============================================================================
// Table
// ============================================================================

const TABLE_COLUMNS = [
    { title: 'Depth', width: 6 },
    { title: 'Name', width: 22 },
    { title: 'Headline', width: 35 },
    { title: 'Location', width: 20 },
    { title: 'Company', width: 20 },
] as const;

function tableRow(profile: ProfileRecord): string[] {
    const name = getDisplayName(profile, 'N/A');
    const headline = getStringField(profile, 'headline', 'N/A');
    const city = getGeo(profile)?.city ?? 'N/A';
    const company = getCurrentPosition(profile)?.companyName ?? 'N/A';
    return [
        String(profile.depth_level),
        truncate(name, 22),
        truncate(headline, 35, 32),
        truncate(city, 20, 17),
        truncate(company, 20, 17),
    ];
}

function formatCells(cells: readonly string[]): string {
    return cells
        .map((cell, index) => cell.padEnd(TABLE_COLUMNS[index].width))
        .join('  ')
        .trimEnd();
}

/**
 * Profiles as a fixed-width table of at most `maxRows` rows
 */
export function formatProfilesTable(profiles: ProfileRecord[], maxRows: number = DEFAULT_DISPLAY_MAX_ROWS): string {
    if (profiles.length === 0) {
        return yellow('No profiles to display');
    }

    const lines = [
        bold('Discovered Profiles'),
        bold(formatCells(TABLE_COLUMNS.map(column => column.title))),
        gray(TABLE_COLUMNS.map(column => '-'.repeat(column.width)).join('  ')),
    ];
    for (const profile of profiles.slice(0, maxRows)) {
        lines.push(formatCells(tableRow(profile)));
    }
    if (profiles.length > maxRows) {
        lines.push(gray(`... and ${profiles.length - maxRows} more profiles`));
    }
    return lines.join('\n');
}

// ============================================================================
// Tree
// ============================================================================

export interface ProfilesTreeOptions {
    /** Children shown per node. Default: 5 */
    maxChildren?: number;
    /** Levels shown below each root. Default: 3 */
    maxDepth?: number;
    /** Root profiles shown. Default: 10 */
    maxRoots?: number;
}

interface DisplayNode {
    label: string;
    children: DisplayNode[];
}

function renderNodes(nodes: DisplayNode[], prefix: string, lines: string[]): void {
    nodes.forEach((node, index) => {
        const isLast = index === nodes.length - 1;
        lines.push(`${prefix}${gray(isLast ? '└── ' : '├── ')}${node.label}`);
        renderNodes(node.children, prefix + (isLast ? '    ' : gray('│   ')), lines);
    });
}

/**
 * Discovery hierarchy as an indented tree, limited for readability
 */
export function formatProfilesTree(profiles: ProfileRecord[], options: ProfilesTreeOptions = {}): string {
    const {
        maxChildren = DEFAULT_DISPLAY_TREE_CHILDREN,
        maxDepth = DEFAULT_DISPLAY_TREE_DEPTH,
        maxRoots = DEFAULT_DISPLAY_TREE_ROOTS,
    } = options;

    if (profiles.length === 0) {
        return yellow('No profiles to display');
    }

    const roots = profiles.filter(profile => profile.depth_level === 0);
    if (roots.length === 0) {
        return yellow('No root profiles found (depth 0)');
    }

    const childrenMap = buildChildrenMap(profiles);

    const label = (profile: ProfileRecord): string => {
        const parts = [green(getDisplayName(profile)), gray('│'), yellow(truncate(getStringField(profile, 'headline'), 43, 40))];
        const city = getGeo(profile)?.city;
        if (city) {
            parts.push(gray('│'), cyan(city));
        }
        const count = childrenMap.get(profile.urn)?.length ?? 0;
        if (count > 0) {
            parts.push(gray(`(${count} discovered)`));
        }
        return parts.join(' ');
    };

    const buildNode = (profile: ProfileRecord, depth: number): DisplayNode => {
        const node: DisplayNode = { label: label(profile), children: [] };
        if (depth >= maxDepth) {
            return node;
        }
        const children = childrenMap.get(profile.urn) ?? [];
        node.children = children.slice(0, maxChildren).map(child => buildNode(child, depth + 1));
        if (children.length > maxChildren) {
            node.children.push({ label: gray(`... and ${children.length - maxChildren} more profiles`), children: [] });
        }
        return node;
    };

    const nodes = roots.slice(0, maxRoots).map(root => buildNode(root, 0));
    for (const node of nodes) {
        node.label = bold(node.label);
    }
    if (roots.length > maxRoots) {
        nodes.push({ label: gray(`... and ${roots.length - maxRoots} more starting profiles`), children: [] });
    }

    const lines = [`${bold(cyan('Discovery Tree'))} ${gray(`(${profiles.length} total profiles)`)}`];
    renderNodes(nodes, '', lines);
    lines.push('', gray(`Note: Showing up to ${maxChildren} profiles per node and ${maxDepth} levels deep for readability`));
    return lines.join('\n');
}
