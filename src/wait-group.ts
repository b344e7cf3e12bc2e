/** Tracks in-flight promises so shutdown can wait for all of them, including ones added while waiting. */
export class WaitGroup {
    private readonly pending = new Set<Promise<unknown>>();

    get size(): number {
        return this.pending.size;
    }

    /** The caller keeps responsibility for handling a rejection of `task`. */
    add(task: Promise<unknown>): void {
        this.pending.add(task);
        const done = () => {
            this.pending.delete(task);
        };
        void task.then(done, done);
    }

    async wait(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.allSettled(this.pending);
        }
    }
}
