import { renderMessage } from '../combat/messages.js';
import type { BroadcastOptions, Combatant, Location } from '../combat/types.js';

/**
 * Minimal location: knows who is present and renders broadcasts per viewer.
 */
export class Room implements Location {
    private contents: Set<Combatant> = new Set();

    constructor(readonly key: string) { }

    enter(combatant: Combatant): void {
        this.contents.add(combatant);
    }

    leave(combatant: Combatant): void {
        this.contents.delete(combatant);
    }

    has(combatant: Combatant): boolean {
        return this.contents.has(combatant);
    }

    getContents(): Combatant[] {
        return Array.from(this.contents);
    }

    broadcast(text: string, options: BroadcastOptions): void {
        for (const viewer of this.contents) {
            if (options.exclude.includes(viewer)) continue;
            viewer.sendMessage(renderMessage(text, {
                viewer,
                from: options.from,
                mapping: options.mapping
            }));
        }
    }
}
