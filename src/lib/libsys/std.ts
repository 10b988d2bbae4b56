/**
 * libsys/std
 *
 * User-facing output. Kernel diagnostics go through printk instead.
 */

export namespace std {
	export interface Sink {
		write(chunk: string): unknown
	}

	let out: Sink = process.stdout;

	export function setSink(sink: Sink) {
		out = sink;
	}

	export function print(...data: unknown[]) {
		out.write(data.join(' ') + '\n');
	}

	export function printraw(...data: unknown[]) {
		out.write(data.join(' '));
	}
}
