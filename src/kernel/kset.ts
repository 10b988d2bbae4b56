/**
 * kernel/kset
 *
 * The registry: owns the root nodes, creates nodes under roots or other nodes,
 * and tears them down when their last reference is dropped.
 *
 *	<mountpoint>/
 *		|-> devices
 *		|	|-> sda
 *		|-> health
 *		|-> info
 *
 * Structural edits (create, destroy) are synchronous, so each one finishes
 * before another can touch the same roots or children collection.
 */

import { Err, Ok, Result } from "libsys/result";
import { Attribute, error as kobjectError, isValidName, KObject, KType } from "./kobject";
import { Level, printk } from "./printk";

/// Whatever makes nodes visible to the outside, usually `krnlfs.Filesystem`.
export interface Renderer {
	publish(kobj: KObject, attributes: ReadonlyArray<string>): Result<undefined>;
	unpublish(kobj: KObject): void;
	resolve(token: string): Result<[KObject, Attribute]>;
}

export enum Action {
	Add,
	Remove
}

export type UEvent = (kobj: KObject, action: Action) => void;

export interface KSetOptions {
	name: string,
	renderer: Renderer,
	mountpoint?: string,
	uevent?: UEvent
}

export interface CreateOptions<P> {
	parent?: KObject,
	payload?: P
}

export interface RootDeclaration<P = unknown> {
	name: string,
	ktype: KType<P>,
	payload?: P
}

export namespace error {
	export class InvalidName extends Error {
		name: string = 'InvalidName';
		constructor(readonly node: string) { super(`'${node}' is not a valid node name`) }
	}
	export class NodeExists extends Error {
		name: string = 'NodeExists';
		constructor(readonly node: string) { super(`Node '${node}' already exists`) }
	}
	export class PublishFailed extends Error {
		name: string = 'PublishFailed';
		constructor(readonly node: string, cause: Error) { super(`Cannot publish '${node}'`, { cause }) }
	}
	export class InitFailed extends Error {
		name: string = 'InitFailed';
		constructor(readonly node: string, cause: Error) { super(`Initialization failed at '${node}'`, { cause }) }
	}
	export class Detached extends Error {
		name: string = 'Detached';
		constructor(readonly node: string) { super(`Node '${node}' is no longer attached to the tree`) }
	}
	export class KSetUnregistered extends Error {
		name: string = 'KSetUnregistered';
		constructor(readonly kset: string) { super(`KSet '${kset}' is unregistered`) }
	}
}

export class KSet {
	readonly name: string;
	readonly mountpoint: string;
	private readonly renderer: Renderer;
	private readonly uevent: UEvent;
	private readonly _roots: Map<string, KObject> = new Map();
	private registered = true;

	constructor(options: KSetOptions) {
		this.name = options.name;
		this.mountpoint = options.mountpoint ?? '/';
		this.renderer = options.renderer;
		this.uevent = options.uevent ?? (() => { });
	}

	roots(): Array<KObject> {
		return Array.from(this._roots.values());
	}

	/// Finds a live node by its path relative to the mount point, e.g. `devices/sda`.
	lookup(nodePath: string): KObject | undefined {
		const names = nodePath.split('/').filter((name) => name != '');
		const first = names.shift();
		if (first == undefined)
			return undefined;

		let kobj = this._roots.get(first);
		for (const name of names) {
			if (kobj == undefined)
				return undefined;
			kobj = kobj.children.get(name);
		}

		return kobj;
	}

	create<P>(name: string, ktype: KType<P>, options: CreateOptions<P> = {}): Result<KObject<P>> {
		const parent = options.parent;

		if (!this.registered)
			return Err(new error.KSetUnregistered(this.name));
		if (!isValidName(name))
			return Err(new error.InvalidName(name));
		if (parent && !parent.live)
			return Err(new kobjectError.NodeDestroyed(parent.name));
		if (parent && !this.attached(parent))
			return Err(new error.Detached(parent.name));

		const siblings = parent ? parent.children : this._roots;
		if (siblings.has(name))
			return Err(new error.NodeExists(name));

		const payload = options.payload !== undefined ? options.payload : ktype.defaults();
		const kobj = new KObject<P>(name, ktype, this, payload, parent);
		siblings.set(name, kobj);

		const published = this.renderer.publish(kobj, ktype.attributes.map((attr) => attr.name));
		if (!published.ok) {
			// Never went live, so release is not owed.
			const nodePath = kobj.path();
			siblings.delete(name);
			kobj.parent = undefined;
			printk(Level.Warning, `kset: cannot publish '${nodePath}': ${published.error.message}`);
			return Err(new error.PublishFailed(name, published.error));
		}

		printk(Level.Debug, `kset: added '${kobj.path()}'`);
		this.uevent(kobj, Action.Add);

		return Ok(kobj);
	}

	/// Reachable from one of this kset's roots through registered children.
	private attached(kobj: KObject): boolean {
		if (!kobj.live || kobj.kset != this)
			return false;
		if (kobj.parent == undefined)
			return this._roots.get(kobj.name) == kobj;

		return kobj.parent.children.get(kobj.name) == kobj && this.attached(kobj.parent);
	}

	/// Takes an extra reference, held until a matching `put`.
	get<P>(kobj: KObject<P>): Result<KObject<P>> {
		return kobj.get();
	}

	put(kobj: KObject): Result<boolean> {
		return kobj.put((dead) => this.finalize(dead));
	}

	/// Holds the node for the length of a callback. Pins are not given back by `put`.
	pin<P>(kobj: KObject<P>): Result<KObject<P>> {
		return kobj.pin();
	}

	unpin(kobj: KObject): Result<boolean> {
		return kobj.unpin((dead) => this.finalize(dead));
	}

	/**
	 * Gives up the caller's reference. The node goes away once no reference is
	 * left; children it still has are detached, not destroyed.
	 */
	destroy(kobj: KObject): Result<boolean> {
		return this.put(kobj);
	}

	private finalize(kobj: KObject) {
		const nodePath = kobj.path();
		this.renderer.unpublish(kobj);

		const siblings = kobj.parent ? kobj.parent.children : this._roots;
		if (siblings.get(kobj.name) == kobj)
			siblings.delete(kobj.name);
		kobj.parent = undefined;

		for (const child of kobj.children.values()) {
			printk(Level.Debug, `kset: detached '${child.name}' from '${nodePath}'`);
			child.parent = undefined;
		}
		kobj.children.clear();

		printk(Level.Debug, `kset: released '${nodePath}'`);
		this.uevent(kobj, Action.Remove);
		kobj.ktype.release(kobj);
	}

	/**
	 * Creates the declared roots in order. Either all of them end up live, or
	 * the ones created so far are destroyed again, newest first.
	 */
	initialize(layout: ReadonlyArray<RootDeclaration>): Result<Array<KObject>, error.InitFailed> {
		const created: Array<KObject> = [];

		for (const declaration of layout) {
			const kobj = this.create(declaration.name, declaration.ktype, { payload: declaration.payload });

			if (!kobj.ok) {
				printk(Level.Err, `kset: '${declaration.name}' failed, rolling back ${created.length} root(s)`);
				this.unwind(created);
				return Err(new error.InitFailed(declaration.name, kobj.error));
			}

			created.push(kobj.value);
		}

		return Ok(created);
	}

	private unwind(created: Array<KObject>) {
		for (const kobj of [...created].reverse()) {
			const r = this.destroy(kobj);
			if (!r.ok)
				printk(Level.Err, `kset: cannot roll back '${kobj.name}': ${r.error.message}`);
		}
	}

	/// Drops the creator reference of every remaining root, newest first.
	exit(): Result<undefined> {
		if (!this.registered)
			return Err(new error.KSetUnregistered(this.name));

		this.registered = false;
		this.unwind(this.roots());

		return Ok(undefined);
	}
}
