/**
 * Messages between a ThreadPoolTaskRunner and its threads over the pool's
 * BroadcastChannel.
 */

/** Sent by the pool before it is destroyed */
export const CLOSE_MESSAGE = 'close-contexts';

export function messageData(message: unknown): unknown {
    return typeof message === 'object' && message !== null ? Reflect.get(message, 'data') : undefined;
}

/** Thread id carried by a close acknowledgement, or null */
export function closedThread(message: unknown): number | null {
    const data = messageData(message);
    if (typeof data !== 'object' || data === null) return null;
    const closed: unknown = Reflect.get(data, 'closed');
    return typeof closed === 'number' ? closed : null;
}
