/**
 * Bounded capture of one output stream. Keeps the most recent `maxBytes`;
 * older bytes are dropped and counted so the reader knows what is missing.
 */
export class OutputBuffer {
    private chunks: Buffer[] = [];
    private size = 0;
    private dropped = 0;

    constructor(private readonly maxBytes: number) {}

    append(chunk: Buffer): void {
        if (chunk.length === 0) {
            return;
        }
        this.chunks.push(chunk);
        this.size += chunk.length;

        while (this.size > this.maxBytes) {
            const head = this.chunks[0];
            if (!head) {
                break;
            }
            const excess = this.size - this.maxBytes;
            if (head.length <= excess) {
                this.chunks.shift();
                this.size -= head.length;
                this.dropped += head.length;
            } else {
                this.chunks[0] = head.subarray(excess);
                this.size -= excess;
                this.dropped += excess;
            }
        }
    }

    get truncated(): boolean {
        return this.dropped > 0;
    }

    /**
     * Retained output as UTF-8. After a cut, leading continuation bytes of a
     * split character are dropped too, and a `[... truncated N bytes]` line
     * is prepended.
     */
    toString(): string {
        const retained = Buffer.concat(this.chunks, this.size);
        if (this.dropped === 0) {
            return retained.toString('utf8');
        }

        let start = 0;
        while (start < retained.length && (retained.readUInt8(start) & 0xc0) === 0x80) {
            start++;
        }
        const text = retained.subarray(start).toString('utf8');
        return `[... truncated ${this.dropped + start} bytes]\n${text}`;
    }
}
