/**
 * kernel/syscall
 *
 * Here lies the implementation of the file calls programs make against
 * the attribute tree. Every table keeps its own file handles.
 */

import { syscall } from "libsys";
import { sysfs } from "libsys/fs";
import { Err, Ok, Result } from "libsys/result";
import type { Dispatcher } from "./dispatch";
import type { krnlfs } from "./fs";
import { isReadable, isWritable } from "./kobject";

interface FileDescriptor {
	path: string,
	accessFlag: sysfs.open.AccessFlag
}

export namespace error {
	export class NoSuchFileHandle extends Error { name: string = 'NoSuchFileHandle'; constructor(readonly handle: sysfs.open.Handle) { super(`No such file handle '${handle}'`) } }
	export class OperationInaccessible extends Error {
		name: string = 'OperationInaccessible';
		constructor(readonly operation: 'read' | 'write') {
			super(`This operation is inaccessible: '${operation}'`);
		}
	}
}

function wantsRead(accessFlag: sysfs.open.AccessFlag): boolean {
	return accessFlag == sysfs.open.AccessFlag.ReadOnly || accessFlag == sysfs.open.AccessFlag.ReadWrite;
}

function wantsWrite(accessFlag: sysfs.open.AccessFlag): boolean {
	return accessFlag == sysfs.open.AccessFlag.WriteOnly || accessFlag == sysfs.open.AccessFlag.ReadWrite;
}

export function createSyscalls(fs: krnlfs.Filesystem, dispatcher: Dispatcher): syscall.Syscalls {
	const fileDescriptors: Map<sysfs.open.Handle, FileDescriptor> = new Map();

	function getNewFileHandle(): sysfs.open.Handle {
		let fileHandle = 0;
		for (const key of fileDescriptors.keys()) {
			if (key > fileHandle)
				fileHandle = key;
		}

		return fileHandle + 1;
	}

	function getFileDescriptor(handle: sysfs.open.Handle): Result<FileDescriptor> {
		const fd = fileDescriptors.get(handle);
		if (fd == undefined)
			return Err(new error.NoSuchFileHandle(handle));

		return Ok(fd);
	}

	return {
		async open(path, accessFlag) {
			const resolved = fs.resolve(path);
			if (!resolved.ok)
				return resolved;

			const [, attr] = resolved.value;
			if (wantsRead(accessFlag) && !isReadable(attr))
				return Err(new error.OperationInaccessible('read'));
			if (wantsWrite(accessFlag) && !isWritable(attr))
				return Err(new error.OperationInaccessible('write'));

			const handle = getNewFileHandle();
			fileDescriptors.set(handle, { path, accessFlag });

			return Ok(handle);
		},

		async close(handle) {
			return fileDescriptors.delete(handle);
		},

		async read(handle) {
			const fd = getFileDescriptor(handle);
			if (!fd.ok)
				return fd;
			if (!wantsRead(fd.value.accessFlag))
				return Err(new error.OperationInaccessible('read'));

			return dispatcher.onRead(fd.value.path);
		},

		async write(handle, buffer) {
			const fd = getFileDescriptor(handle);
			if (!fd.ok)
				return fd;
			if (!wantsWrite(fd.value.accessFlag))
				return Err(new error.OperationInaccessible('write'));

			const stored = await dispatcher.onWrite(fd.value.path, buffer);
			if (!stored.ok)
				return stored;

			return Ok(buffer.length);
		},

		async readdir(path) {
			return fs.readdir(path);
		},
	};
}
