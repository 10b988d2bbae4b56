/**
 * kernel/fs
 *
 * In-memory rendering layer. Nodes become directories, their attributes
 * become functional files that carry no data of their own: reading or
 * writing one is routed to the attribute's callbacks by the dispatcher.
 */

import { sysfs } from "libsys/fs";
import { Err, Ok, Result } from "libsys/result";
import path from "path-browserify";
import { Attribute, isReadable, isWritable, KObject } from "./kobject";
import type { Renderer } from "./kset";
import { Level, printk } from "./printk";

export type FSEntryDirectory = {
	type: sysfs.entry.Type.Directory,
	name: string,
	attributes: sysfs.entry.Attributes,
	entries: Array<FSEntry>,
	kobj?: KObject
};
export type FSEntryAttribute = {
	type: sysfs.entry.Type.FunctionalFile,
	name: string,
	attributes: sysfs.entry.Attributes,
	mode: number,
	kobj: KObject,
	attr: Attribute
};

export type FSEntry =
	| FSEntryDirectory
	| FSEntryAttribute;

export namespace krnlfs {
	export namespace error {
		export class NoSuchEntry extends Error { name: string = 'NoSuchEntry'; constructor(readonly path: string) { super(`No such entry '${path}'`) } }
		export class EntryExists extends Error { name: string = 'EntryExists'; constructor(readonly path: string) { super(`Entry '${path}' already exists`) } }
		export class ParentDoesntExist extends Error { name: string = 'ParentDoesntExist'; constructor(readonly path: string) { super(`Parent of '${path}' doesn't exist`) } }
		export class IsADirectory extends Error { name: string = 'IsADirectory'; constructor(readonly path: string) { super(`'${path}' is a directory`) } }
		export class NotADirectory extends Error { name: string = 'NotADirectory'; constructor(readonly path: string) { super(`'${path}' is not a directory`) } }
	}

	/// Looked-up entry and the directory holding it (the deepest existing one on failure).
	type Lookup = Result<[FSEntry, FSEntryDirectory], [Error, FSEntryDirectory]>;

	function attributesOf(attr: Attribute): sysfs.entry.Attributes {
		return [isReadable(attr), isWritable(attr), false];
	}

	export class Filesystem implements Renderer {
		readonly root: FSEntryDirectory = {
			type: sysfs.entry.Type.Directory,
			name: '/',
			attributes: [true, false, true],
			entries: []
		};

		private published: Map<KObject, string> = new Map();

		private getEntry(entryPath: string): Lookup {
			const normalized = path.normalize(entryPath.startsWith('/') ? entryPath : `/${entryPath}`);
			const pathElements = normalized.split('/').filter((pel) => pel != '');

			if (pathElements.length == 0)
				return Ok([this.root, this.root]);

			let currentDirectory: FSEntryDirectory = this.root;

			for (let i = 0; i < pathElements.length; i++) {
				const entry = currentDirectory.entries.find((e) => e.name == pathElements[i]);

				if (entry == undefined) {
					if (i == pathElements.length - 1)
						return Err([new error.NoSuchEntry(normalized), currentDirectory]);
					return Err([new error.ParentDoesntExist(normalized), currentDirectory]);
				}

				if (i == pathElements.length - 1)
					return Ok([entry, currentDirectory]);

				if (entry.type != sysfs.entry.Type.Directory)
					return Err([new error.NotADirectory(normalized), currentDirectory]);

				currentDirectory = entry;
			}

			return Err([new error.NoSuchEntry(normalized), currentDirectory]);
		}

		mkdir(dirPath: string, recursive: boolean = false): Result<undefined> {
			const foundEntry = this.getEntry(dirPath);

			if (!recursive) {
				if (foundEntry.ok)
					return Err(new error.EntryExists(dirPath));
				if (!(foundEntry.error[0] instanceof error.NoSuchEntry))
					return Err(foundEntry.error[0]);

				foundEntry.error[1].entries.push({
					type: sysfs.entry.Type.Directory,
					name: path.basename(dirPath),
					attributes: [true, false, true],
					entries: []
				});
				return Ok(undefined);
			}

			let newPath = '/';
			for (const pel of dirPath.split('/').filter((e) => e != '')) {
				newPath = path.join(newPath, pel);
				const found = this.getEntry(newPath);

				if (found.ok) {
					if (found.value[0].type != sysfs.entry.Type.Directory)
						return Err(new error.NotADirectory(newPath));
					continue;
				}

				found.error[1].entries.push({
					type: sysfs.entry.Type.Directory,
					name: pel,
					attributes: [true, false, true],
					entries: []
				});
			}

			return Ok(undefined);
		}

		publish(kobj: KObject, attributes: ReadonlyArray<string>): Result<undefined> {
			const dirPath = kobj.path();
			const foundEntry = this.getEntry(dirPath);

			if (foundEntry.ok)
				return Err(new error.EntryExists(dirPath));
			if (!(foundEntry.error[0] instanceof error.NoSuchEntry))
				return Err(foundEntry.error[0]);

			const entries: Array<FSEntry> = [];
			for (const name of attributes) {
				const attr = kobj.ktype.attribute(name);
				if (attr == undefined)
					return Err(new error.NoSuchEntry(path.join(dirPath, name)));

				entries.push({
					type: sysfs.entry.Type.FunctionalFile,
					name,
					attributes: attributesOf(attr),
					mode: sysfs.attr.modeBits(attr.mode),
					kobj,
					attr
				});
			}

			foundEntry.error[1].entries.push({
				type: sysfs.entry.Type.Directory,
				name: kobj.name,
				attributes: [true, false, true],
				entries,
				kobj
			});
			this.published.set(kobj, dirPath);

			printk(Level.Debug, `fs: published '${dirPath}' with ${entries.length} attribute(s)`);
			return Ok(undefined);
		}

		unpublish(kobj: KObject) {
			const dirPath = this.published.get(kobj);
			if (dirPath == undefined)
				return;

			const foundEntry = this.getEntry(dirPath);
			if (foundEntry.ok) {
				const [entry, parent] = foundEntry.value;

				if (entry.kobj == kobj) {
					parent.entries.splice(parent.entries.indexOf(entry), 1);
					if (entry.type == sysfs.entry.Type.Directory)
						this.forget(entry);
				}
			}

			this.published.delete(kobj);
			printk(Level.Debug, `fs: unpublished '${dirPath}'`);
		}

		/// Everything below a removed directory is gone with it.
		private forget(directory: FSEntryDirectory) {
			for (const entry of directory.entries) {
				if (entry.type != sysfs.entry.Type.Directory)
					continue;

				if (entry.kobj)
					this.published.delete(entry.kobj);
				this.forget(entry);
			}
		}

		resolve(token: string): Result<[KObject, Attribute]> {
			const foundEntry = this.getEntry(token);
			if (!foundEntry.ok)
				return Err(foundEntry.error[0]);

			const entry = foundEntry.value[0];
			if (entry.type == sysfs.entry.Type.Directory)
				return Err(new error.IsADirectory(token));

			return Ok([entry.kobj, entry.attr]);
		}

		isPublished(kobj: KObject): boolean {
			return this.published.has(kobj);
		}

		readdir(dirPath: string): Result<Array<sysfs.entry.Entry>> {
			const foundEntry = this.getEntry(dirPath);
			if (!foundEntry.ok)
				return Err(foundEntry.error[0]);

			const entry = foundEntry.value[0];
			if (entry.type != sysfs.entry.Type.Directory)
				return Err(new error.NotADirectory(dirPath));

			return Ok(entry.entries.map((e): sysfs.entry.Entry => {
				if (e.type == sysfs.entry.Type.Directory)
					return { type: e.type, name: e.name, attributes: e.attributes, entries: [] };

				return { type: e.type, name: e.name, attributes: e.attributes, mode: e.mode };
			}));
		}
	}
}
