import type { Combatant } from './types.js';

export interface RenderContext {
    /** Who is reading the message */
    viewer: Combatant | null;
    /** Who the message is about; `$You()` refers to them */
    from: Combatant | null;
    mapping: Record<string, Combatant>;
}

const IRREGULAR_VERBS: Record<string, string> = {
    are: 'is',
    have: 'has',
    do: 'does',
    go: 'goes'
};

/**
 * Third-person singular form of an English verb
 */
export function conjugate(verb: string): string {
    if (Object.hasOwn(IRREGULAR_VERBS, verb)) return IRREGULAR_VERBS[verb];
    if (/(s|sh|ch|x|z|o)$/.test(verb)) return `${verb}es`;
    if (/[^aeiou]y$/.test(verb)) return `${verb.slice(0, -1)}ies`;
    return `${verb}s`;
}

export function pluralize(word: string, count: number): string {
    return count === 1 ? word : `${word}s`;
}

/**
 * Render a combat message for one viewer.
 *
 *   $You()            the sender: "You" to themselves, their name to others
 *   $You(name)        a mapped combatant, "You"/"you" when it is the viewer
 *   $conj(verb)       "attack" for the sender, "attacks" for everyone else
 *   $pluralize(w, n)  "turn" or "turns"
 */
export function renderMessage(text: string, context: RenderContext): string {
    const { viewer, from, mapping } = context;

    return text.replace(/\$(You|you|conj|pluralize)\(([^)]*)\)/g, (match, fn: string, rawArgs: string) => {
        const args = rawArgs.split(',').map(arg => arg.trim());

        switch (fn) {
            case 'You':
            case 'you': {
                const subject = args[0] ? mapping[args[0]] ?? null : from;
                if (!subject) return args[0] || match;
                if (viewer && subject === viewer) return fn;
                return subject.key;
            }
            case 'conj':
                return viewer && from && viewer === from ? args[0] : conjugate(args[0]);
            case 'pluralize':
                return pluralize(args[0], Number(args[1]));
            default:
                return match;
        }
    });
}
