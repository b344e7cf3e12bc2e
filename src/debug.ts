export type DebugLog = (...args: unknown[]) => void;

export const silent: DebugLog = () => { };

export function debugLog(enabled: boolean, tag = '[SOCKS5]'): DebugLog {
    if (!enabled) return silent;
    return (...args: unknown[]) => console.log(tag, ...args);
}
