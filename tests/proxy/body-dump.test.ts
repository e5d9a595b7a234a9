import { Readable } from 'stream';
import { describePreview, tapResponseBody, BodyPreview } from '../../src/proxy/body-dump';
import { bodyOf, flushPromises, readBody } from '../helpers';

describe('tapResponseBody', () => {
    it('should pass the full body through and capture only the first bytes', async () => {
        const source = Readable.from(
            [Buffer.from('abc'), Buffer.from('defgh'), Buffer.from('ij')],
            { objectMode: false },
        );
        const onComplete = jest.fn<void, [BodyPreview]>();

        const tapped = tapResponseBody(source, 4, onComplete);
        const text = await readBody(tapped);

        expect(text).toBe('abcdefghij');
        expect(onComplete).toHaveBeenCalledTimes(1);
        const [{ preview, totalBytes }] = onComplete.mock.calls[0];
        expect(preview.toString('utf8')).toBe('abcd');
        expect(totalBytes).toBe(10);
    });

    it('should capture the whole body when it is shorter than the limit', async () => {
        const onComplete = jest.fn<void, [BodyPreview]>();

        await readBody(tapResponseBody(bodyOf('840000'), 64, onComplete));

        expect(onComplete.mock.calls[0][0].preview.toString('utf8')).toBe('840000');
    });

    it('should report source failures', async () => {
        const source = new Readable({ read() { /* driven below */ } });
        const onError = jest.fn<void, [Error]>();
        const tapped = tapResponseBody(source, 4, jest.fn(), onError);

        source.destroy(new Error('socket hang up'));
        await expect(readBody(tapped)).rejects.toThrow('socket hang up');
        await flushPromises();

        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError.mock.calls[0][0].message).toBe('socket hang up');
    });
});

describe('describePreview', () => {
    it('should print text as is', () => {
        expect(describePreview(Buffer.from('{"height":840000}\n'))).toBe('{"height":840000}\n');
    });

    it('should print binary as hex', () => {
        expect(describePreview(Buffer.from([0x00, 0x01, 0xff]))).toBe('hex:0001ff');
    });
});
