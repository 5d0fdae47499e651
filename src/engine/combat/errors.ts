export type CombatHandlerErrorCode =
    | 'INVALID_PARTICIPANT'
    | 'ALREADY_ENGAGED'
    | 'HANDLER_DESTROYED';

export class CombatHandlerError extends Error {
    constructor(readonly code: CombatHandlerErrorCode, message: string) {
        super(message);
        this.name = 'CombatHandlerError';
    }
}
