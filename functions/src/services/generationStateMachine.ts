export type GenerationState = 'generating' | 'validating' | 'retrying' | 'done' | 'degraded' | 'failed';

const validTransitions: Record<GenerationState, GenerationState[]> = {
    'generating': ['validating', 'retrying', 'done', 'failed'],
    'validating': ['done', 'retrying', 'degraded'],
    'retrying': ['generating'],
    'done': [],
    'degraded': [],
    'failed': []
};

/**
 * Validates a state transition for one generation run.
 * `generating -> done` is the path taken when validation is switched off,
 * `generating -> retrying` the one taken after a failed LLM call that is not the last.
 */
export function validateStateTransition(
    currentState: GenerationState | undefined,
    newState: GenerationState
): boolean {
    if (!currentState) {
        // Every run starts with a model call
        return newState === 'generating';
    }

    return validTransitions[currentState].includes(newState);
}

/**
 * Tracks where a run is and refuses moves the table does not allow.
 */
export class GenerationRun {
    private current: GenerationState | undefined;
    readonly history: GenerationState[] = [];

    constructor(private readonly label: string) {}

    get state(): GenerationState | undefined {
        return this.current;
    }

    transition(next: GenerationState): void {
        if (!validateStateTransition(this.current, next)) {
            throw new Error(`[${this.label}] Invalid state transition ${this.current ?? '(start)'} -> ${next}`);
        }
        this.current = next;
        this.history.push(next);
    }
}
