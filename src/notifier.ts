import { TimeoutError } from './errors';

/**
 * Wakes every pending waiter on `notify()`. Waiters given a deadline reject with
 * TimeoutError once it passes.
 */
export class Notifier {
    private waiters: Array<() => void> = [];

    notify(): void {
        const waiters = this.waiters;
        this.waiters = [];
        for (const wake of waiters) wake();
    }

    wait(deadline?: number): Promise<void> {
        return new Promise((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            const wake = () => {
                clearTimeout(timer);
                resolve();
            };
            this.waiters.push(wake);

            if (deadline !== undefined) {
                timer = setTimeout(() => {
                    this.waiters = this.waiters.filter((w) => w !== wake);
                    reject(new TimeoutError());
                }, Math.max(0, deadline - Date.now()));
            }
        });
    }
}
