/**
 * Patterns — Pluggable Regular-Expression Capability
 *
 * `regexp()` and `allSuffixRegexp()` only need two operations: "does the
 * value match" and "rewrite the value with a template". They depend on
 * the {@link Pattern} interface, so a different engine (RE2, PCRE bindings...)
 * can be swapped in by compiling patterns with it.
 *
 * The default {@link regExpEngine} uses JavaScript `RegExp`:
 * - a value matches when the pattern matches **starting at offset 0**;
 * - the rewrite replaces every match, `$1`, `$&`... referring to groups.
 *
 * @example
 * ```typescript
 * const p = regExpEngine.compile('\\[(.*)\\]');
 * p.matches('[hello]');              // true
 * p.rewrite('[hello]', '($1)');      // "(hello)"
 * ```
 *
 * @module
 */

export interface Pattern {
    /** Source text, part of the parameter type's structural description */
    readonly source: string;
    /** Whether the pattern matches at the start of `input` */
    matches(input: string): boolean;
    /** Replace every match in `input` by `template` */
    rewrite(input: string, template: string): string;
}

export interface PatternEngine {
    compile(source: string): Pattern;
}

/** Something `regexp()` accepts: pattern source, a `RegExp`, or a compiled {@link Pattern}. */
export type PatternInput = string | RegExp | Pattern;

class RegExpPattern implements Pattern {
    private readonly _anchored: RegExp;
    private readonly _global: RegExp;

    constructor(readonly source: string, flags = '') {
        const base = flags.replace(/[gy]/g, '');
        this._anchored = new RegExp(source, `${base}y`);
        this._global = new RegExp(source, `${base}g`);
    }

    matches(input: string): boolean {
        this._anchored.lastIndex = 0;
        return this._anchored.test(input);
    }

    rewrite(input: string, template: string): string {
        this._global.lastIndex = 0;
        return input.replace(this._global, template);
    }
}

/** Default engine backed by JavaScript `RegExp`. */
export const regExpEngine: PatternEngine = {
    compile: source => new RegExpPattern(source),
};

/** Normalize a {@link PatternInput} to a {@link Pattern}. */
export function toPattern(input: PatternInput, engine: PatternEngine = regExpEngine): Pattern {
    if (typeof input === 'string') return engine.compile(input);
    if (input instanceof RegExp) return new RegExpPattern(input.source, input.flags);
    return input;
}
