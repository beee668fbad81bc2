import { TRANSLATOR_NAMES } from '../../../../src/domain/entities/Language';
import { LanguageNotSupportedError } from '../../../../src/domain/errors/TranslationErrors';
import {
    getLanguageTable,
    languageNameForCode,
    resolveLanguage,
    supportedLanguages,
} from '../../../../src/domain/services/LanguageRegistry';

describe('LanguageRegistry', () => {
    describe.each(TRANSLATOR_NAMES.map(name => [name]))('%s table', backend => {
        const table = getLanguageTable(backend);

        it('resolves every name and its code to the same code', () => {
            for (const [name, code] of Object.entries(table)) {
                expect(resolveLanguage(name, table, backend)).toBe(code);
                expect(resolveLanguage(code, table, backend)).toBe(code);
            }
        });

        it('keeps codes unique', () => {
            const codes = Object.values(table);
            expect(new Set(codes).size).toBe(codes.length);
        });

        it('never lists auto', () => {
            expect(Object.keys(table)).not.toContain('auto');
            expect(Object.values(table)).not.toContain('auto');
        });
    });

    it('returns the same frozen table on every call', () => {
        const first = getLanguageTable('google');
        expect(getLanguageTable('google')).toBe(first);
        expect(Object.isFrozen(first)).toBe(true);
    });

    it('resolves display names case-insensitively', () => {
        const table = getLanguageTable('google');
        expect(resolveLanguage('german', table, 'google')).toBe('de');
        expect(resolveLanguage('German', table, 'google')).toBe('de');
        expect(resolveLanguage('  GERMAN ', table, 'google')).toBe('de');
    });

    it('resolves auto without consulting the table', () => {
        const table = getLanguageTable('qcri');
        expect(resolveLanguage('auto', table, 'qcri')).toBe('auto');
        expect(resolveLanguage('AUTO', table, 'qcri')).toBe('auto');
    });

    it('maps the same language to vendor-specific codes', () => {
        expect(resolveLanguage('japanese', getLanguageTable('google'), 'google')).toBe('ja');
        expect(resolveLanguage('japanese', getLanguageTable('baidu'), 'baidu')).toBe('jp');
        expect(resolveLanguage('english', getLanguageTable('mymemory'), 'mymemory')).toBe('en-GB');
    });

    it('rejects unknown languages naming the value and the backend', () => {
        const table = getLanguageTable('deepl');
        expect(() => resolveLanguage('klingon', table, 'deepl')).toThrow(LanguageNotSupportedError);
        expect(() => resolveLanguage('klingon', table, 'deepl')).toThrow(
            '"klingon" is not supported by the deepl translator.'
        );
    });

    it('lists names or the full mapping', () => {
        const table = getLanguageTable('qcri');
        expect(supportedLanguages(table)).toEqual(['arabic', 'english', 'spanish']);
        expect(supportedLanguages(table, true)).toEqual({ arabic: 'ar', english: 'en', spanish: 'es' });
    });

    it('finds the display name of a code', () => {
        const table = getLanguageTable('pons');
        expect(languageNameForCode('de', table)).toBe('german');
        expect(languageNameForCode('xx', table)).toBeUndefined();
    });
});
