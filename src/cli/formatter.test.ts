import {describe, expect, it} from 'vitest';
import {PassThrough} from 'stream';
import {OutputFormatter, formatColumns} from './formatter.js';

function capture(stream: PassThrough): () => string {
	const chunks: string[] = [];
	stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
	return () => chunks.join('');
}

describe('formatColumns', () => {
	it('pads every column but the last to its widest cell', () => {
		expect(
			formatColumns([
				['NAME', 'HEIGHT'],
				['stand', '1.1m'],
				['sit', '0.7m'],
			]),
		).toEqual(['NAME   HEIGHT', 'stand  1.1m', 'sit    0.7m']);
	});

	it('trims trailing padding from empty last cells', () => {
		expect(
			formatColumns([
				['a', 'b', ''],
				['long', 'b', 'yes'],
			]),
		).toEqual(['a     b', 'long  b  yes']);
	});
});

describe('OutputFormatter', () => {
	it('writes text lines in text mode', async () => {
		const stdout = new PassThrough();
		const stderr = new PassThrough();
		const out = capture(stdout);
		const err = capture(stderr);
		const formatter = new OutputFormatter(false, stdout, stderr);

		formatter.write({text: ['one', 'two'], data: {ignored: true}});
		formatter.writeError({text: ['Error: bad'], data: {}});
		await new Promise(resolve => setImmediate(resolve));

		expect(out()).toBe('one\ntwo\n');
		expect(err()).toBe('Error: bad\n');
		expect(formatter.isJsonEnabled()).toBe(false);
	});

	it('writes one JSON line of data in JSON mode', async () => {
		const stdout = new PassThrough();
		const out = capture(stdout);
		const formatter = new OutputFormatter(true, stdout, new PassThrough());

		formatter.write({text: ['ignored'], data: {position: 'sit'}});
		await new Promise(resolve => setImmediate(resolve));

		expect(out()).toBe('{"position":"sit"}\n');
	});
});
