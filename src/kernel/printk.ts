/**
 * kernel/printk
 *
 * Leveled kernel log. Lines look like `[info] message`.
 */

import ansi, { type Style } from 'ansi-escape-sequences';

export enum Level {
	Emerg,
	Alert,
	Crit,
	Err,
	Warning,
	Notice,
	Info,
	Debug
}

export const levelNames = ['emerg', 'alert', 'crit', 'err', 'warning', 'notice', 'info', 'debug'] as const;
export type LevelName = typeof levelNames[number];

const levelStyles: Record<Level, Style[]> = {
	[Level.Emerg]: ['bold', 'red'],
	[Level.Alert]: ['bold', 'red'],
	[Level.Crit]: ['red'],
	[Level.Err]: ['red'],
	[Level.Warning]: ['yellow'],
	[Level.Notice]: ['cyan'],
	[Level.Info]: ['green'],
	[Level.Debug]: ['magenta'],
};

export interface Sink {
	write(chunk: string): unknown
}

let sink: Sink = process.stderr;
let threshold = Level.Info;
let color = true;

export function printk(level: Level, ...data: unknown[]) {
	if (level > threshold)
		return;

	const tag = color ? ansi.format(levelNames[level], levelStyles[level]) : levelNames[level];
	sink.write(`[${tag}] ${data.join(' ')}\n`);
}

export namespace printk {
	export function setSink(s: Sink) {
		sink = s;
	}

	export function setLevel(level: Level) {
		threshold = level;
	}

	export function setColor(enabled: boolean) {
		color = enabled;
	}

	export function levelFromName(name: LevelName): Level {
		return levelNames.indexOf(name);
	}
}
