import { AUTO_LANGUAGE, LanguageTable, TranslatorName } from '../entities/Language';
import { ConfigurationError, SameSourceTargetError } from '../errors/TranslationErrors';
import { getLanguageTable, resolveLanguage } from './LanguageRegistry';

export interface LanguageSelectionOptions {
    /** Whether the vendor accepts "auto" as a source language. */
    supportsAutoDetection: boolean;
}

/**
 * Resolved source/target pair owned by one translator instance.
 *
 * Both fields may be reassigned after construction; every assignment is
 * re-validated. Mutating a selection while a request on the same translator
 * is in flight is undefined.
 */
export class LanguageSelection {
    readonly table: LanguageTable;
    private sourceCode: string;
    private targetCode: string;

    constructor(
        readonly backend: TranslatorName,
        source: string,
        target: string,
        private readonly options: LanguageSelectionOptions
    ) {
        this.table = getLanguageTable(backend);
        const sourceCode = this.resolveSource(source);
        const targetCode = this.resolveTargetCode(target);
        this.assertDistinct(sourceCode, targetCode);
        this.sourceCode = sourceCode;
        this.targetCode = targetCode;
    }

    get source(): string {
        return this.sourceCode;
    }

    set source(value: string) {
        const code = this.resolveSource(value);
        this.assertDistinct(code, this.targetCode);
        this.sourceCode = code;
    }

    get target(): string {
        return this.targetCode;
    }

    set target(value: string) {
        this.targetCode = this.validateTarget(value);
    }

    get isAutoSource(): boolean {
        return this.sourceCode === AUTO_LANGUAGE;
    }

    /**
     * Resolves a target against the table and the current source without storing it.
     */
    validateTarget(value: string): string {
        const code = this.resolveTargetCode(value);
        this.assertDistinct(this.sourceCode, code);
        return code;
    }

    private resolveSource(value: string): string {
        const code = resolveLanguage(value, this.table, this.backend);
        if (code === AUTO_LANGUAGE && !this.options.supportsAutoDetection) {
            throw new ConfigurationError(
                `The ${this.backend} translator cannot detect the source language; pass an explicit source`,
                'AUTO_NOT_SUPPORTED'
            );
        }
        return code;
    }

    private resolveTargetCode(value: string): string {
        const code = resolveLanguage(value, this.table, this.backend);
        if (code === AUTO_LANGUAGE) {
            throw new ConfigurationError(`"${AUTO_LANGUAGE}" is only valid as a source language`, 'AUTO_TARGET');
        }
        return code;
    }

    // sourceCode is still unset during construction, hence the explicit arguments.
    private assertDistinct(source: string, target: string): void {
        if (source !== AUTO_LANGUAGE && source === target) {
            throw new SameSourceTargetError(source);
        }
    }
}
