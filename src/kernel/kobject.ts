/**
 * kernel/kobject
 *
 * Attributes, node types (ktypes) and the reference counted node itself.
 *
 * A ktype is declared once as a plain table and validated up front, so a
 * malformed one can never reach the tree:
 *
 *	const info = defineKType({
 *		name: 'info',
 *		attributes: [
 *			attribute('num_devices', sysfs.attr.Mode.ReadOnly, { show: () => Ok(encode('0')) }),
 *		],
 *	});
 */

import { sysfs } from "libsys/fs";
import { Err, MaybePromiseResult, Ok, Result } from "libsys/result";
import path from "path-browserify";
import type { KSet } from "./kset";

const textEncoder = new TextEncoder();

export function encode(text: string): Uint8Array {
	return textEncoder.encode(text);
}

export interface AttributeOps<P> {
	show?(kobj: KObject<P>, attr: Attribute<P>): MaybePromiseResult<Uint8Array>;
	store?(kobj: KObject<P>, buffer: Uint8Array, attr: Attribute<P>): MaybePromiseResult<undefined>;
}

export interface Attribute<P = unknown> extends AttributeOps<P> {
	readonly name: string;
	readonly mode: sysfs.attr.Mode;
}

export interface KType<P = unknown> {
	readonly name: string;
	readonly attributes: ReadonlyArray<Attribute<P>>;
	attribute(name: string): Attribute<P> | undefined;
	defaults(): P;
	release(kobj: KObject<P>): void;
}

export interface KTypeDeclaration<P> {
	name: string;
	attributes: ReadonlyArray<Attribute<P>>;
	release?(kobj: KObject<P>): void;
	defaults?(): P;
}

export namespace error {
	export class ValidationError extends Error {
		name: string = 'ValidationError';
		constructor(readonly ktype: string, readonly issues: ReadonlyArray<string>) {
			super(`Invalid ktype '${ktype}': ${issues.join('; ')}`);
		}
	}

	export class NodeDestroyed extends Error {
		name: string = 'NodeDestroyed';
		constructor(readonly node: string) { super(`Node '${node}' is destroyed`) }
	}

	export class RefcountUnderflow extends Error {
		name: string = 'RefcountUnderflow';
		constructor(readonly node: string) { super(`Node '${node}' has no references left to drop`) }
	}
}

export function isValidName(name: string): boolean {
	return name.length > 0 && !name.includes('/') && name != '.' && name != '..';
}

export function attribute<P = unknown>(name: string, mode: sysfs.attr.Mode, ops: AttributeOps<P> = {}): Attribute<P> {
	return Object.freeze({ name, mode, show: ops.show, store: ops.store });
}

export function isReadable(attr: Attribute): boolean {
	return attr.show != undefined;
}

export function isWritable(attr: Attribute): boolean {
	return attr.mode == sysfs.attr.Mode.ReadWrite && attr.store != undefined;
}

function validate<P>(declaration: KTypeDeclaration<P>): Array<string> {
	const issues: Array<string> = [];
	const seen = new Set<string>();

	if (!isValidName(declaration.name))
		issues.push(`'${declaration.name}' is not a valid ktype name`);

	for (const attr of declaration.attributes) {
		if (!isValidName(attr.name))
			issues.push(`'${attr.name}' is not a valid attribute name`);

		if (seen.has(attr.name))
			issues.push(`attribute '${attr.name}' is declared twice`);
		seen.add(attr.name);

		if (attr.mode == sysfs.attr.Mode.ReadWrite && !attr.store)
			issues.push(`read-write attribute '${attr.name}' has no store`);

		if (attr.mode == sysfs.attr.Mode.ReadOnly && attr.store)
			issues.push(`read-only attribute '${attr.name}' has a store`);
	}

	return issues;
}

export function defineKType(declaration: KTypeDeclaration<undefined>): Result<KType<undefined>, error.ValidationError>;
export function defineKType<P>(declaration: KTypeDeclaration<P> & { defaults(): P }): Result<KType<P>, error.ValidationError>;
export function defineKType(declaration: KTypeDeclaration<unknown>): Result<KType<unknown>, error.ValidationError> {
	const issues = validate(declaration);
	if (issues.length > 0)
		return Err(new error.ValidationError(declaration.name, issues));

	const attributes = Object.freeze([...declaration.attributes]);
	const byName = new Map(attributes.map((attr) => [attr.name, attr]));

	return Ok(Object.freeze({
		name: declaration.name,
		attributes,
		attribute: (name: string) => byName.get(name),
		defaults: () => declaration.defaults ? declaration.defaults() : undefined,
		release: (kobj: KObject) => declaration.release?.(kobj),
	}));
}

export enum State {
	Live,
	Destroyed
}

export class KObject<P = unknown> {
	parent: KObject | undefined;
	readonly children: Map<string, KObject> = new Map();
	private refs = 1;
	/// References held by in-flight callbacks, see `pin`.
	private pins = 0;
	private _state = State.Live;

	constructor(
		readonly name: string,
		readonly ktype: KType<P>,
		readonly kset: KSet,
		public payload: P,
		parent?: KObject
	) {
		this.parent = parent;
	}

	get refcount(): number {
		return this.refs;
	}

	get pinned(): number {
		return this.pins;
	}

	get state(): State {
		return this._state;
	}

	get live(): boolean {
		return this._state == State.Live;
	}

	/// Location under the kset's mount point, following the parent chain.
	path(): string {
		if (this.parent)
			return path.join(this.parent.path(), this.name);

		return path.join(this.kset.mountpoint, this.name);
	}

	get(): Result<this, error.NodeDestroyed> {
		if (!this.live)
			return Err(new error.NodeDestroyed(this.name));

		this.refs++;
		return Ok(this);
	}

	/// Like `get`, but only `unpin` gives the reference back.
	pin(): Result<this, error.NodeDestroyed> {
		const r = this.get();
		if (r.ok)
			this.pins++;

		return r;
	}

	/**
	 * Drops one reference taken with `get`. `release` runs once, on the drop
	 * that reaches zero, after which the node is destroyed and takes no further
	 * references. Pinned references cannot be dropped here.
	 */
	put(release: (kobj: this) => void): Result<boolean, error.RefcountUnderflow> {
		if (this.refs - this.pins == 0)
			return Err(new error.RefcountUnderflow(this.name));

		return this.drop(release);
	}

	unpin(release: (kobj: this) => void): Result<boolean, error.RefcountUnderflow> {
		if (this.pins == 0)
			return Err(new error.RefcountUnderflow(this.name));

		this.pins--;
		return this.drop(release);
	}

	private drop(release: (kobj: this) => void): Result<boolean, error.RefcountUnderflow> {
		this.refs--;
		if (this.refs > 0)
			return Ok(false);

		this._state = State.Destroyed;
		release(this);
		return Ok(true);
	}
}
