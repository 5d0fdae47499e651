import seedrandom from 'seedrandom';

/**
 * Source of uniformly distributed integers.
 * Combat code only ever rolls through this, so tests can script the dice.
 */
export interface DieRoller {
    /** Integer in the closed range [min, max] */
    roll(min: number, max: number): number;
}

export interface DiceExpression {
    count: number;
    sides: number;
    modifier: number;
}

export interface DiceRollResult {
    expression: string;
    rolls: number[];
    modifier: number;
    total: number;
}

/**
 * Seeded die roller. The same seed always produces the same sequence.
 */
export class SeededDieRoller implements DieRoller {
    private rng: seedrandom.PRNG;
    readonly seed: string;

    constructor(seed?: string) {
        this.seed = seed || new Date().toISOString();
        this.rng = seedrandom(this.seed);
    }

    roll(min: number, max: number): number {
        if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
            throw new Error(`Invalid die range: ${min}..${max}`);
        }
        return Math.floor(this.rng() * (max - min + 1)) + min;
    }
}

// Parse string "2d6+4" into DiceExpression object
export function parseDice(expression: string): DiceExpression {
    const match = expression.trim().match(/^(\d+)d(\d+)([+-]\d+)?$/);
    if (!match) {
        throw new Error(`Invalid dice expression: ${expression}`);
    }

    const count = parseInt(match[1], 10);
    const sides = parseInt(match[2], 10);
    const modifier = match[3] ? parseInt(match[3], 10) : 0;

    if (count < 1 || sides < 1) {
        throw new Error(`Invalid dice expression: ${expression}`);
    }

    return { count, sides, modifier };
}

export function rollDice(roller: DieRoller, expression: string | DiceExpression): DiceRollResult {
    const expr = typeof expression === 'string' ? parseDice(expression) : expression;
    const rolls: number[] = [];

    for (let i = 0; i < expr.count; i++) {
        rolls.push(roller.roll(1, expr.sides));
    }

    const total = rolls.reduce((acc, val) => acc + val, 0) + expr.modifier;

    return {
        expression: typeof expression === 'string'
            ? expression
            : `${expr.count}d${expr.sides}${expr.modifier === 0 ? '' : expr.modifier > 0 ? `+${expr.modifier}` : expr.modifier}`,
        rolls,
        modifier: expr.modifier,
        total
    };
}
