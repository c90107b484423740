import fs from 'fs';
import path from 'path';
import { z } from 'zod';

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/loot-items.json');

/** Discord caps autocomplete responses at 25 choices. */
export const MAX_SUGGESTIONS = 25;

export interface AutocompleteChoice {
    name: string;
    value: string;
}

// Choice names and values are limited to 100 characters by Discord.
const catalogSchema = z.array(z.string().trim().min(1).max(100));

/**
 * Immutable list of item names offered as `/loot` suggestions.
 */
export class LootCatalog {
    readonly items: readonly string[];

    constructor(items: Iterable<string>) {
        this.items = Object.freeze(Array.from(new Set(items)));
    }

    static fromFile(filePath: string = DEFAULT_CATALOG_PATH): LootCatalog {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        return new LootCatalog(catalogSchema.parse(raw));
    }

    get size(): number {
        return this.items.length;
    }

    /**
     * Case-insensitive substring match, in catalog order, capped at
     * {@link MAX_SUGGESTIONS}. An empty query matches everything.
     */
    suggest(partial: string): AutocompleteChoice[] {
        const needle = partial.toLowerCase();
        const choices: AutocompleteChoice[] = [];

        for (const name of this.items) {
            if (!name.toLowerCase().includes(needle)) continue;
            choices.push({ name, value: name });
            if (choices.length === MAX_SUGGESTIONS) break;
        }

        return choices;
    }
}
