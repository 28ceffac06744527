import { createPatch } from 'diff';
import type { DiffDisplayData } from '@corral/core';

function countLines(unified: string, marker: '+' | '-'): number {
    let count = 0;
    for (const line of unified.split('\n')) {
        // Skip the ---/+++ file headers
        if (line.startsWith(marker) && !line.startsWith(marker.repeat(3))) {
            count++;
        }
    }
    return count;
}

export function generateDiffDisplay(
    filePath: string,
    before: string,
    after: string
): DiffDisplayData {
    const unified = createPatch(filePath, before, after, 'before', 'after', { context: 3 });
    return {
        type: 'diff',
        filename: filePath,
        unified,
        additions: countLines(unified, '+'),
        deletions: countLines(unified, '-'),
    };
}
