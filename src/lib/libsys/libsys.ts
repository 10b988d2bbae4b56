/**
 * libsys/libsys
 *
 * The core of libsys.
 * Programs reach the kernel's attribute files only through these calls.
 */

import { sysfs } from "./fs";
import { PromiseResult } from "./result";

let kernel: syscall.Syscalls | undefined;

export namespace syscall {
	export interface Syscalls {
		open(path: string, accessFlag: sysfs.open.AccessFlag): PromiseResult<sysfs.open.Handle>;
		close(handle: sysfs.open.Handle): Promise<boolean>;

		read(handle: sysfs.open.Handle): PromiseResult<Uint8Array>;
		write(handle: sysfs.open.Handle, buffer: Uint8Array): PromiseResult<number>;

		readdir(path: string): PromiseResult<Array<sysfs.entry.Entry>>;
	}

	function attached(): Syscalls {
		if (kernel == undefined)
			throw new Error("Cannot use syscalls, libsys isn't attached to a kernel.");

		return kernel;
	}

	export const syscalls: Syscalls = {
		async open(path, accessFlag) {
			return attached().open(path, accessFlag);
		},
		async close(handle) {
			return attached().close(handle);
		},

		async read(handle) {
			return attached().read(handle);
		},
		async write(handle, buffer) {
			return attached().write(handle, buffer);
		},

		async readdir(path) {
			return attached().readdir(path);
		},
	};
}

/// Attaches libsys to a kernel syscall table, see `kernel/syscall`.
export function libsysInit(table: syscall.Syscalls) {
	kernel = table;
}

export default syscall.syscalls;
