export interface ExecutionFeedback {
    stdout: string;
    stderr: string;
    exitCode: number;
}

/** User prompt for turn > 1: the previous execution's output, then the model's own continuation. */
export function buildContinuationPrompt(feedback: ExecutionFeedback, continuation: string): string {
    return (
        'System Output:\n' +
        `[STDOUT]\n${feedback.stdout}\n` +
        `[STDERR]\n${feedback.stderr}\n` +
        `[RETURN_CODE]\n${feedback.exitCode}\n\n` +
        continuation
    );
}

/** User prompt for turn 1. */
export function buildInitialPrompt(instruction: string, context: string): string {
    return `${instruction}\n\n${context}`;
}
