/**
 * Relation vocabulary: maps source-specific predicate names onto canonical
 * relation types.
 *
 * The table is data (config/relations.json plus configured aliases). Lookups
 * ignore case and punctuation, so `treats_disease`, `TreatsDisease` and
 * `treatsDisease` are one key. Unknown predicates pass through unchanged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CanonicalRelation, RelationAlias, RelationVocabularyConfig } from '../types/ontology.js';
import { createInvalidArgumentError, createSourceNotFoundError } from '../types/errors.js';

export const BUNDLED_RELATIONS_FILE = path.join(__dirname, '..', '..', 'config', 'relations.json');

const VocabularyFileSchema = z.object({
    canonical: z.array(z.string().min(1)).default([]),
    aliases: z.record(z.union([
        z.string().min(1),
        z.object({ type: z.string().min(1), inverse: z.boolean().optional() }),
    ])).default({}),
});

/**
 * Lookup key for a relation name
 */
export function relationKey(name: string): string {
    return name.normalize('NFC').toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

export class RelationVocabulary {
    private readonly table = new Map<string, CanonicalRelation>();
    private readonly canonicalNames = new Set<string>();

    constructor(config: RelationVocabularyConfig = {}) {
        this.extend(config);
    }

    /**
     * Add canonical names and aliases. Later entries replace earlier ones.
     */
    extend(config: RelationVocabularyConfig): void {
        for (const name of config.canonical ?? []) {
            this.canonicalNames.add(name);
            this.table.set(relationKey(name), { type: name, inverse: false });
        }
        for (const [alias, target] of Object.entries(config.aliases ?? {})) {
            const entry: RelationAlias = typeof target === 'string' ? { type: target } : target;
            this.canonicalNames.add(entry.type);
            if (!this.table.has(relationKey(entry.type))) {
                this.table.set(relationKey(entry.type), { type: entry.type, inverse: false });
            }
            this.table.set(relationKey(alias), { type: entry.type, inverse: entry.inverse ?? false });
        }
    }

    /**
     * Canonical type for a predicate; `inverse` means source and target swap.
     */
    canonicalize(name: string): CanonicalRelation {
        return this.table.get(relationKey(name)) ?? { type: name.trim(), inverse: false };
    }

    /**
     * Snapshot of the table, for the graph://relations resource
     */
    toJSON(): { canonical: string[]; aliases: Record<string, CanonicalRelation> } {
        const aliases: Record<string, CanonicalRelation> = {};
        for (const [key, relation] of this.table) {
            if (relationKey(relation.type) !== key) {
                aliases[key] = relation;
            }
        }
        return { canonical: [...this.canonicalNames].sort(), aliases };
    }
}

/**
 * Read a vocabulary JSON file ({ canonical: [...], aliases: {...} })
 */
export function readVocabularyFile(filePath: string): RelationVocabularyConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (e) {
        throw createSourceNotFoundError(filePath, e instanceof Error ? e.message : String(e));
    }
    const result = VocabularyFileSchema.safeParse(raw);
    if (!result.success) {
        throw createInvalidArgumentError(`Invalid relation vocabulary in ${filePath}`, {
            issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }
    return result.data;
}

/**
 * Build the vocabulary from a file (bundled by default) plus inline aliases
 */
export function loadRelationVocabulary(options: {
    relationsFile?: string;
    relationAliases?: Record<string, string | RelationAlias>;
} = {}): RelationVocabulary {
    const vocabulary = new RelationVocabulary(readVocabularyFile(options.relationsFile ?? BUNDLED_RELATIONS_FILE));
    if (options.relationAliases) {
        vocabulary.extend({ aliases: options.relationAliases });
    }
    return vocabulary;
}
