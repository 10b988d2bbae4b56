/**
 * libsys/fs
 *
 * Types shared between the kernel's rendering layer and its callers.
 */

export namespace sysfs {
	export namespace open {
		export type Handle = number;

		export enum AccessFlag {
			None,
			ReadOnly,
			WriteOnly,
			ReadWrite
		}
	}

	export namespace attr {
		export enum Mode {
			ReadOnly,
			ReadWrite
		}

		/// Permission bits an attribute file is rendered with.
		export function modeBits(mode: Mode): number {
			return mode == Mode.ReadWrite ? 0o644 : 0o444;
		}
	}

	export namespace entry {
		export enum Type {
			Directory,
			FunctionalFile
		}

		/// Read, write, execute
		export type Attributes = [boolean, boolean, boolean];

		export type Directory = { type: Type.Directory, name: string, attributes: Attributes, entries: Array<Entry> };
		export type FunctionalFile = {
			type: Type.FunctionalFile,
			name: string,
			attributes: Attributes,
			mode: number
		};

		export type Entry =
			| Directory
			| FunctionalFile;

		export function attributesToString(attributes: Attributes): string {
			return `${attributes[0] ? 'r' : '-'}${attributes[1] ? 'w' : '-'}${attributes[2] ? 'x' : '-'}`;
		}
	}
}
