import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';

export type TranslationVars = Record<string, string>;

interface LocaleTree {
    [key: string]: string | LocaleTree;
}

const isLocaleTree = (value: unknown): value is LocaleTree =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

@Injectable()
export class I18nService {
    private readonly logger = new Logger(I18nService.name);
    private readonly cache = new Map<string, LocaleTree | null>();
    private localesDir: string;

    constructor(localesDir?: string) {
        // Same path from src/i18n and from dist/i18n
        this.localesDir = localesDir ?? path.join(__dirname, '..', '..', 'locales');
    }

    private loadLocaleFile(locale: string): LocaleTree | null {
        const cached = this.cache.get(locale);
        if (cached !== undefined) return cached;

        const file = path.join(this.localesDir, `${locale}.json`);
        let tree: LocaleTree | null = null;
        try {
            const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
            tree = isLocaleTree(parsed) ? parsed : null;
        } catch (err) {
            this.logger.debug(`Locale file not found for ${locale}, fallback to en`);
            if (locale !== 'en') return this.loadLocaleFile('en');
        }
        this.cache.set(locale, tree);
        return tree;
    }

    t(key: string, locale = 'en', vars?: TranslationVars): string {
        const data = this.loadLocaleFile(locale) ?? {};
        let cur: string | LocaleTree | undefined = data;
        for (const p of key.split('.')) {
            if (!isLocaleTree(cur)) {
                cur = undefined;
                break;
            }
            cur = cur[p];
        }

        let str = typeof cur === 'string' ? cur : key;

        if (vars) {
            str = str.replace(/\{\{(\w+)\}\}/g, (_, k: string) => vars[k] ?? '');
        }

        return str;
    }
}
