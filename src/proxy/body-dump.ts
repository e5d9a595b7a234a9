import { pipeline, Readable, Transform, TransformCallback } from 'stream';

export interface BodyPreview {
    preview: Buffer;      // at most `limit` bytes
    totalBytes: number;
}

/**
 * Passes the body through untouched while keeping a copy of its first `limit`
 * bytes, reported once the stream ends. Errors on either side tear down both.
 */
export function tapResponseBody(
    body: Readable,
    limit: number,
    onComplete: (result: BodyPreview) => void,
    onError?: (err: Error) => void,
): Readable {
    const chunks: Buffer[] = [];
    let captured = 0;
    let totalBytes = 0;

    const tap = new Transform({
        transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback) {
            const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
            totalBytes += buf.length;
            if (captured < limit) {
                const slice = buf.subarray(0, limit - captured);
                chunks.push(slice);
                captured += slice.length;
            }
            callback(null, buf);
        },
        flush(callback: TransformCallback) {
            onComplete({ preview: Buffer.concat(chunks), totalBytes });
            callback();
        },
    });

    pipeline(body, tap, (err) => {
        if (err && onError) onError(err);
    });
    return tap;
}

/** Printable rendering of a preview for a log line. */
export function describePreview(preview: Buffer): string {
    const text = preview.toString('utf8');
    // control characters other than newline/tab mean binary; show hex instead
    return /[\u0000-\u0008\u000e-\u001f]/.test(text) ? `hex:${preview.toString('hex')}` : text;
}
