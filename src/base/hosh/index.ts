/**
 * base/hosh
 *
 * A tiny shell for browsing and poking the attribute tree.
 */

import { createInterface } from "node:readline";
import { syscall } from "libsys";
import { sysfs } from "libsys/fs";
import { Ok, PromiseResult } from "libsys/result";
import { std } from "libsys/std";
import path from "path-browserify";
import ansi, { type Style } from 'ansi-escape-sequences';

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

export interface ShellOptions {
	cwd?: string,
	color?: boolean
}

type Command = (params: Array<string>) => PromiseResult<undefined>;

export class Shell {
	cwd: string;
	private readonly color: boolean;
	private readonly commands: Record<string, Command> = {
		'ls': (params) => this.ls(params),
		'cat': (params) => this.cat(params),
		'echo': (params) => this.echo(params),
		'tree': (params) => this.tree(params),
		'cd': (params) => this.cd(params),
		'help': async () => {
			std.print('Commands: ls [path], cat <path>, echo <text> > <path>, tree [path], cd <path>, help');
			return Ok(undefined);
		},
	};

	constructor(options: ShellOptions = {}) {
		this.cwd = options.cwd ?? '/';
		this.color = options.color ?? false;
	}

	private resolve(target: string | undefined): string {
		if (target == undefined)
			return this.cwd;

		return path.resolve(this.cwd, target);
	}

	private paint(text: string, style: Style): string {
		return this.color ? ansi.format(text, [style]) : text;
	}

	get prompt(): string {
		return `${this.paint('[hosh', 'green')} ${this.cwd}${this.paint(']$', 'green')} `;
	}

	/// Runs one line. Failures are printed, never thrown.
	async interpret(line: string): Promise<void> {
		const [name, ...params] = line.trim().split(/\s+/);
		if (name == undefined || name == '')
			return;

		if (!Object.hasOwn(this.commands, name)) {
			std.print(`hosh: unknown command '${name}'`);
			return;
		}

		const r = await this.commands[name](params);
		if (!r.ok)
			std.print(`${name}: ${r.error.name}: ${r.error.message}`);
	}

	private async ls(params: Array<string>): PromiseResult<undefined> {
		const entries = await syscall.syscalls.readdir(this.resolve(params[0]));
		if (!entries.ok)
			return entries;

		for (const entry of entries.value) {
			if (entry.type == sysfs.entry.Type.Directory)
				std.print(`${sysfs.entry.attributesToString(entry.attributes)} ${this.paint(entry.name + '/', 'blue')}`);
			else
				std.print(`${sysfs.entry.attributesToString(entry.attributes)} ${entry.name}`);
		}

		return Ok(undefined);
	}

	private async cat(params: Array<string>): PromiseResult<undefined> {
		if (params.length == 0) {
			std.print('Usage: cat <path>');
			return Ok(undefined);
		}

		const fh = await syscall.syscalls.open(this.resolve(params[0]), sysfs.open.AccessFlag.ReadOnly);
		if (!fh.ok)
			return fh;

		const data = await syscall.syscalls.read(fh.value);
		await syscall.syscalls.close(fh.value);
		if (!data.ok)
			return data;

		std.printraw(textDecoder.decode(data.value));
		return Ok(undefined);
	}

	private async echo(params: Array<string>): PromiseResult<undefined> {
		const redirect = params.indexOf('>');
		if (redirect == -1) {
			std.print(params.join(' '));
			return Ok(undefined);
		}

		if (redirect != params.length - 2) {
			std.print('Usage: echo <text> > <path>');
			return Ok(undefined);
		}

		const fh = await syscall.syscalls.open(this.resolve(params[redirect + 1]), sysfs.open.AccessFlag.WriteOnly);
		if (!fh.ok)
			return fh;

		const written = await syscall.syscalls.write(fh.value, textEncoder.encode(params.slice(0, redirect).join(' ') + '\n'));
		await syscall.syscalls.close(fh.value);
		if (!written.ok)
			return written;

		return Ok(undefined);
	}

	private async tree(params: Array<string>, depth = 0): PromiseResult<undefined> {
		const dir = this.resolve(params[0]);
		if (depth == 0)
			std.print(dir);

		const entries = await syscall.syscalls.readdir(dir);
		if (!entries.ok)
			return entries;

		for (const entry of entries.value) {
			std.print(`${'  '.repeat(depth)}|-> ${entry.name}`);

			if (entry.type == sysfs.entry.Type.Directory) {
				const r = await this.tree([path.join(dir, entry.name)], depth + 1);
				if (!r.ok)
					return r;
			}
		}

		return Ok(undefined);
	}

	private async cd(params: Array<string>): PromiseResult<undefined> {
		const target = this.resolve(params[0] ?? '/');
		const entries = await syscall.syscalls.readdir(target);
		if (!entries.ok)
			return entries;

		this.cwd = target;
		return Ok(undefined);
	}

	/// Reads lines until the input ends.
	async run(input: NodeJS.ReadableStream): Promise<void> {
		const rl = createInterface({ input, terminal: false });

		std.printraw(this.prompt);
		for await (const line of rl) {
			await this.interpret(line);
			std.printraw(this.prompt);
		}
		std.print();
	}
}
