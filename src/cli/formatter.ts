export interface FormattedOutput<T = unknown> {
	text: string[];
	data: T;
}

/**
 * Pad each column to its widest cell so rows line up in plain text output.
 */
export function formatColumns(rows: string[][], gap = 2): string[] {
	const widths: number[] = [];
	for (const row of rows) {
		row.forEach((cell, index) => {
			widths[index] = Math.max(widths[index] ?? 0, cell.length);
		});
	}

	return rows.map(row =>
		row
			.map((cell, index) =>
				index === row.length - 1
					? cell
					: cell.padEnd((widths[index] ?? 0) + gap),
			)
			.join('')
			.trimEnd(),
	);
}

export class OutputFormatter {
	constructor(
		private readonly json: boolean,
		private readonly stdout: NodeJS.WritableStream = process.stdout,
		private readonly stderr: NodeJS.WritableStream = process.stderr,
	) {}

	isJsonEnabled(): boolean {
		return this.json;
	}

	write(output: FormattedOutput): void {
		this.render(output, false);
	}

	writeError(output: FormattedOutput): void {
		this.render(output, true);
	}

	private render(output: FormattedOutput, isError: boolean): void {
		const stream = isError ? this.stderr : this.stdout;
		if (this.json) {
			stream.write(`${JSON.stringify(output.data)}\n`);
			return;
		}

		for (const line of output.text) {
			stream.write(`${line}\n`);
		}
	}
}
