/** Raised for strings that are not well-formed language tags. */
export class LanguageTagError extends Error {
    constructor(public readonly tag: string, cause?: unknown) {
        super(`Invalid language tag: "${tag}"`, { cause });
        this.name = 'LanguageTagError';
    }
}

/** The parts of a language tag that matter for text normalization. */
export interface ResolvedLanguage {
    /** Lower-case language subtag, e.g. `en`. */
    readonly language: string;
    /** Upper-case region subtag, e.g. `US`, if the tag has one. */
    readonly territory?: string;
}

/** Resolves an IETF tag such as `en-us`, `fr_CA` or `pt-BR`. */
export function resolveLanguage(tag: string): ResolvedLanguage {
    let locale: Intl.Locale;
    try {
        locale = new Intl.Locale(tag.trim().replace(/_/g, '-'));
    } catch (e) {
        throw new LanguageTagError(tag, e);
    }
    return locale.region
        ? { language: locale.language, territory: locale.region }
        : { language: locale.language };
}

export function isEnglish(tag: string): boolean {
    return resolveLanguage(tag).language === 'en';
}

/**
 * Finds the entries of `available` matching the requested language.
 *
 * When `requested` carries a territory and `territoryMatch` is set, only entries with that
 * same territory qualify; otherwise territories are ignored. All returned indices are
 * equally good matches, the list is empty when none qualifies.
 */
export function findLanguageMatch(
    requested: string | ResolvedLanguage,
    available: readonly (string | ResolvedLanguage)[],
    territoryMatch = true
): number[] {
    const wanted = typeof requested === 'string' ? resolveLanguage(requested) : requested;
    const candidates = available.map(lang => typeof lang === 'string' ? resolveLanguage(lang) : lang);

    let matches = candidates
        .map((lang, index) => ({ lang, index }))
        .filter(({ lang }) => lang.language === wanted.language);

    if (territoryMatch && wanted.territory !== undefined) {
        matches = matches.filter(({ lang }) => lang.territory === wanted.territory);
    }

    return matches.map(({ index }) => index);
}
