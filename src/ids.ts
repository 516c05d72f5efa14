import * as crypto from 'crypto';

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

/** Local calendar date, `YYYY-MM-DD`. Sessions are keyed by it. */
export function sessionIdFor(d: Date = new Date()): string {
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** `step_<YYYYMMDD>T<HHMMSS>_<6 hex>`, filesystem-safe. */
export function newStepId(d: Date = new Date()): string {
    const date = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
    const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
    return `step_${date}T${time}_${crypto.randomBytes(3).toString('hex')}`;
}

export const STEP_ID_PATTERN = /^step_\d{8}T\d{6}_[0-9a-f]{6}$/;
