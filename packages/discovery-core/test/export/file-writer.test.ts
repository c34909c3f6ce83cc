/**
 * Tests for writing export files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    defaultExportFilename,
    exportToCsv,
    exportToJson,
    renderExport,
    writeExport,
} from '../../src/export';
import { ErrorCode, ProfileGraphError } from '../../src/errors';
import type { ProfileRecord } from '../../src/profile';

const now = new Date(2024, 0, 2, 3, 4, 5);

const records: ProfileRecord[] = [
    { urn: 'urn-a', username: 'alice', depth_level: 0, source_urn: '' },
    { urn: 'urn-b', username: 'bob', depth_level: 1, source_urn: 'urn-a' },
];

function captureError(fn: () => unknown): ProfileGraphError {
    try {
        fn();
    } catch (error) {
        if (error instanceof ProfileGraphError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected a ProfileGraphError');
}

describe('defaultExportFilename', () => {
    it('stamps the prefix, kind and local time', () => {
        expect(defaultExportFilename('json', now)).toBe('profile_graph_20240102_030405.json');
        expect(defaultExportFilename('csv', now)).toBe('profile_graph_20240102_030405.csv');
        expect(defaultExportFilename('tree', now)).toBe('profile_graph_tree_20240102_030405.txt');
    });
});

describe('renderExport', () => {
    it('dispatches on the format', () => {
        expect(renderExport(records, 'json')).toBe(exportToJson(records));
        expect(renderExport(records, 'csv')).toBe(exportToCsv(records));
        expect(renderExport(records, 'tree', { now })).toContain('Generated: 2024-01-02 03:04:05');
    });
});

describe('writeExport', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'profile-graph-export-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('writes into a new directory and appends the extension', () => {
        const outputDir = path.join(tmpDir, 'nested', 'out');

        const filePath = writeExport(records, 'csv', { outputDir, filename: 'people' });

        expect(filePath).toBe(path.join(outputDir, 'people.csv'));
        expect(fs.readFileSync(filePath, 'utf8')).toBe(exportToCsv(records));
    });

    it('keeps an existing extension', () => {
        const filePath = writeExport(records, 'json', { outputDir: tmpDir, filename: 'people.json' });
        expect(path.basename(filePath)).toBe('people.json');
    });

    it('generates a timestamped name by default', () => {
        const filePath = writeExport(records, 'tree', { outputDir: tmpDir, now });

        expect(filePath).toBe(path.join(tmpDir, 'profile_graph_tree_20240102_030405.txt'));
        expect(fs.readFileSync(filePath, 'utf8').split('\n')[1]).toBe('Profile Discovery Tree');
    });

    it('refuses to write an empty export', () => {
        const error = captureError(() => writeExport([], 'json', { outputDir: tmpDir }));

        expect(error.code).toBe(ErrorCode.EXPORT_FAILED);
        expect(error.message).toBe('No profiles to export');
        expect(fs.readdirSync(tmpDir)).toEqual([]);
    });

    it('refuses a tree without root profiles', () => {
        const error = captureError(() => writeExport([records[1]], 'tree', { outputDir: tmpDir }));
        expect(error.message).toBe('No root profiles to export');
    });

    it('reports write failures', () => {
        const blocker = path.join(tmpDir, 'blocker');
        fs.writeFileSync(blocker, 'x');
        const outputDir = path.join(blocker, 'sub');

        const error = captureError(() => writeExport(records, 'json', { outputDir, filename: 'out' }));

        expect(error.code).toBe(ErrorCode.EXPORT_FAILED);
        expect(error.message.startsWith(`Failed to write ${path.join(outputDir, 'out.json')}: `)).toBe(true);
    });
});
