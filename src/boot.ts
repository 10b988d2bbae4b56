import { libsysInit } from "libsys";
import { unwrap } from "libsys/result";
import { BtrfsSysfs } from "./base/btrfs/sysfs";
import { Shell } from "./base/hosh";
import { loadConfig } from "./base/sysinit";
import { Dispatcher } from "./kernel/dispatch";
import { krnlfs } from "./kernel/fs";
import { Action, KSet } from "./kernel/kset";
import { Level, printk } from "./kernel/printk";
import { createSyscalls } from "./kernel/syscall";

function panic(message: string, error: Error): never {
	const m = `KERNEL PANIC: ${message}`;
	printk(Level.Emerg, `${m}: ${error.message}`);
	throw new Error(m, { cause: error });
}

/**
 * Configuration and logging
 */

const config = loadConfig(process.argv[2]);
if (!config.ok)
	panic('Cannot load configuration', config.error);

printk.setLevel(printk.levelFromName(config.value.log.level));
printk.setColor(config.value.log.color && process.stderr.isTTY);

/**
 * Mount the kset and build its tree
 *
 * <mountpoint>
 *   - devices
 *   - health
 *   - info
 */

printk(Level.Info, `Mounting kset '${config.value.kset.name}' at '${config.value.kset.mountpoint}'...`);

const fs = new krnlfs.Filesystem();
unwrap(fs.mkdir(config.value.kset.mountpoint, true));

const kset = new KSet({
	name: config.value.kset.name,
	mountpoint: config.value.kset.mountpoint,
	renderer: fs,
	uevent: (kobj, action) => printk(Level.Debug, `uevent: ${action == Action.Add ? 'add' : 'remove'} ${kobj.path()}`),
});

const btrfs = BtrfsSysfs.init(kset);
if (!btrfs.ok)
	panic('Cannot initialize sysfs', btrfs.error);

for (const device of config.value.device) {
	const created = btrfs.value.createDevice(device.label);
	if (!created.ok)
		printk(Level.Warning, `Skipping device '${device.label}': ${created.error.message}`);
}

/**
 * Init syscalls and start the shell
 */

libsysInit(createSyscalls(fs, new Dispatcher(kset, fs)));

const shutdown = () => {
	const r = btrfs.value.exit();
	if (!r.ok)
		printk(Level.Err, `Teardown failed: ${r.error.message}`);
};

if (process.stdin.isTTY) {
	const shell = new Shell({ cwd: config.value.kset.mountpoint, color: process.stdout.isTTY });
	try {
		await shell.run(process.stdin);
	} finally {
		shutdown();
	}
} else {
	printk(Level.Info, `Ready: ${btrfs.value.deviceLabels.length} device(s) under '${kset.mountpoint}/devices'`);
	shutdown();
}
