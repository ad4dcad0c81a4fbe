export type NavTraceScope = 'Tree' | 'Navigation' | 'Input' | 'Persistence' | 'Command';

let seq = 0;
let override: boolean | null = null;

function isEnabled(): boolean {
    if (override !== null) return override;
    const v = process.env.FRACTAL_TRACE;
    return v === '1' || v === 'true';
}

/** Force tracing on or off regardless of FRACTAL_TRACE; `null` restores the env lookup. */
export function setNavTraceEnabled(enabled: boolean | null): void {
    override = enabled;
}

export function navTrace(scope: NavTraceScope, event: string, details: Record<string, unknown> = {}): void {
    if (!isEnabled()) return;
    seq += 1;
    console.log(`[NavTrace][${scope}] #${seq} ${event}`, {
        ts: Date.now(),
        ...details,
    });
}
