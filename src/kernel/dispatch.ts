/**
 * kernel/dispatch
 *
 * Routes a read or write on an attribute file to the attribute's show or store.
 * The node is pinned for the whole call, so a concurrent destroy only
 * finishes once the callback has returned.
 */

import { sysfs } from "libsys/fs";
import { Err, PromiseResult, Result } from "libsys/result";
import type { Attribute, KObject } from "./kobject";
import type { KSet, Renderer } from "./kset";
import { Level, printk } from "./printk";

export namespace error {
	export class NotReadable extends Error {
		name: string = 'NotReadable';
		constructor(readonly attribute: string) { super(`Attribute '${attribute}' cannot be read`) }
	}
	export class NotWritable extends Error {
		name: string = 'NotWritable';
		constructor(readonly attribute: string) { super(`Attribute '${attribute}' cannot be written`) }
	}
	/// A callback threw instead of returning an error.
	export class CallbackError extends Error {
		name: string = 'CallbackError';
		constructor(readonly attribute: string, cause: unknown) { super(`Callback of '${attribute}' threw`, { cause }) }
	}
}

export class Dispatcher {
	constructor(private readonly kset: KSet, private readonly renderer: Renderer) { }

	async onRead(token: string): PromiseResult<Uint8Array> {
		return this.pinned(token, async (kobj, attr) => {
			if (!attr.show)
				return Err(new error.NotReadable(attr.name));

			return attr.show(kobj, attr);
		});
	}

	async onWrite(token: string, buffer: Uint8Array): PromiseResult<undefined> {
		return this.pinned(token, async (kobj, attr) => {
			if (attr.mode != sysfs.attr.Mode.ReadWrite || !attr.store)
				return Err(new error.NotWritable(attr.name));

			return attr.store(kobj, buffer, attr);
		});
	}

	private async pinned<T>(token: string, callback: (kobj: KObject, attr: Attribute) => PromiseResult<T>): PromiseResult<T> {
		const resolved = this.renderer.resolve(token);
		if (!resolved.ok)
			return resolved;

		const [node, attr] = resolved.value;
		const pin = this.kset.pin(node);
		if (!pin.ok)
			return pin;

		const kobj = pin.value;
		try {
			return await callback(kobj, attr);
		} catch (e) {
			printk(Level.Warning, `dispatch: '${attr.name}' of '${kobj.name}' threw: ${e}`);
			return Err(new error.CallbackError(attr.name, e));
		} finally {
			this.unpin(kobj);
		}
	}

	private unpin(kobj: KObject) {
		const r: Result<boolean> = this.kset.unpin(kobj);
		if (!r.ok)
			printk(Level.Err, `dispatch: cannot unpin '${kobj.name}': ${r.error.message}`);
	}
}
