/**
 * NameGenerator — Wire Keys for a Parameter Tree
 *
 * Every encode, decode and name-listing walk threads a `NameGenerator`
 * down the parameter tree. It knows two things:
 *
 * - the **prefix** accumulated from enclosing lists and `addPrefix()`
 *   (`l.0.`, `l.0.m.3.`, `form.`...), prepended to every author-supplied name;
 * - the **position** of the current node, a heap index (root = 1, left child
 *   = 2n, right child = 2n + 1). Anonymous keys (sum discriminators) are
 *   synthesized from it as a short base-36 code.
 *
 * Positions depend only on the tree shape, never on the value being
 * encoded, so encoder and decoder always agree on synthesized keys.
 * Entering a list element resets the position: keys inside an element
 * are already made unique by the `<list>.<index>.` prefix.
 *
 * @example
 * ```typescript
 * const root = NameGenerator.root();
 * root.key('page');                         // "page"
 * root.discriminator();                     // "__sum.1"
 * root.right().discriminator();             // "__sum.3"
 * root.element('l', 0).key('a');            // "l.0.a"
 * root.element('l', 0).discriminator();     // "l.0.__sum.1"
 * ```
 *
 * @module
 */

/** Reserved key stem of sum discriminators */
export const SUM_DISCRIMINATOR = '__sum';

/** Names starting with this are reserved for synthesized keys */
export const RESERVED_NAME_PREFIX = '__';

/** Separator between list name, element index and field name */
export const LIST_SEPARATOR = '.';

export class NameGenerator {
    private constructor(
        readonly prefix: string,
        private readonly position: bigint,
    ) {}

    /** Generator for the root of a parameter tree. */
    static root(prefix = ''): NameGenerator {
        return new NameGenerator(prefix, 1n);
    }

    /** Full wire key of an author-named field at this position. */
    key(name: string): string {
        return this.prefix + name;
    }

    /** Left operand of a product. Also used for the single child of a wrapper node. */
    left(): NameGenerator {
        return new NameGenerator(this.prefix, this.position * 2n);
    }

    /** Right operand of a product. */
    right(): NameGenerator {
        return new NameGenerator(this.prefix, this.position * 2n + 1n);
    }

    /** Scope of the element at `index` in the list called `listName`. */
    element(listName: string, index: number | string): NameGenerator {
        return new NameGenerator(`${this.listPrefix(listName)}${index}${LIST_SEPARATOR}`, 1n);
    }

    /** Common prefix of every key emitted for the list called `listName`. */
    listPrefix(listName: string): string {
        return `${this.prefix}${listName}${LIST_SEPARATOR}`;
    }

    /** Same position, with `prefix` appended to the accumulated prefix. */
    withPrefix(prefix: string): NameGenerator {
        return new NameGenerator(this.prefix + prefix, this.position);
    }

    /** Short alphanumeric code of the current position. */
    get code(): string {
        return this.position.toString(36);
    }

    /** Synthesized key recording which side of a sum at this position was chosen. */
    discriminator(): string {
        return `${this.prefix}${SUM_DISCRIMINATOR}.${this.code}`;
    }
}
