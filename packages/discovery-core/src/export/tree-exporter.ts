/**
 * Tree Exporter
 *
 * Renders the discovery forest as plain text: one tree per seed, children
 * keyed by `source_urn`.
 */

import { getDisplayName, getGeo, getStringField } from '../profile';
import type { ProfileRecord } from '../profile';
import { DEFAULT_TREE_MAX_CHILDREN, DEFAULT_TREE_MAX_DEPTH } from '../config/defaults';
import type { TreeExportOptions } from './types';

const RULE = '='.repeat(80);

/**
 * Group records by the URN of the profile that discovered them
 */
export function buildChildrenMap(profiles: ProfileRecord[]): Map<string, ProfileRecord[]> {
    const children = new Map<string, ProfileRecord[]>();
    for (const profile of profiles) {
        if (!profile.source_urn) {
            continue;
        }
        const siblings = children.get(profile.source_urn);
        if (siblings) {
            siblings.push(profile);
        } else {
            children.set(profile.source_urn, [profile]);
        }
    }
    return children;
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Text tree of the records; '' when no record sits at depth 0.
 */
export function exportToTree(profiles: ProfileRecord[], options: TreeExportOptions = {}): string {
    const {
        maxChildrenPerNode = DEFAULT_TREE_MAX_CHILDREN,
        maxDepth = DEFAULT_TREE_MAX_DEPTH,
        generatedAt = new Date(),
    } = options;

    const roots = profiles.filter(profile => profile.depth_level === 0);
    if (roots.length === 0) {
        return '';
    }

    const childrenMap = buildChildrenMap(profiles);
    const lines: string[] = [
        RULE,
        'Profile Discovery Tree',
        `Total Profiles: ${profiles.length}`,
        `Generated: ${formatTimestamp(generatedAt)}`,
        RULE,
        '',
    ];

    const label = (profile: ProfileRecord): string => {
        let text = `${getDisplayName(profile)} | ${getStringField(profile, 'headline', 'No headline')}`;
        const location = getGeo(profile)?.full;
        if (location) {
            text += ` | ${location}`;
        }
        const count = childrenMap.get(profile.urn)?.length ?? 0;
        if (count > 0) {
            text += ` (${count} discovered)`;
        }
        return text;
    };

    const addChildren = (parent: ProfileRecord, prefix: string, depth: number): void => {
        if (depth >= maxDepth) {
            return;
        }
        const children = childrenMap.get(parent.urn) ?? [];
        const visible = children.slice(0, maxChildrenPerNode);
        const hidden = children.length - visible.length;

        visible.forEach((child, index) => {
            const isLast = index === visible.length - 1 && hidden === 0;
            const childPrefix = prefix + (isLast ? '    ' : '│   ');
            lines.push(`${prefix}${isLast ? '└── ' : '├── '}${label(child)}`);
            lines.push(`${childPrefix}  username: ${child.username}`);
            addChildren(child, childPrefix, depth + 1);
        });

        if (hidden > 0) {
            lines.push(`${prefix}└── ... and ${hidden} more profiles`);
        }
    };

    for (const root of roots) {
        lines.push(label(root));
        lines.push(`  username: ${root.username}`);
        addChildren(root, '', 0);
        lines.push('');
    }

    lines.push('', RULE, `End of Tree - ${profiles.length} total profiles`, RULE);
    return lines.join('\n');
}
