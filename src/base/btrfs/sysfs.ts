/**
 * base/btrfs/sysfs
 *
 * The filesystem's entries under its kset:
 *
 *	<mountpoint>/
 *		|-> devices/<label>/label
 *		|-> health/errors
 *		|-> info/num_devices
 *
 * To add a top level directory declare its ktype below and append it to
 * `layout`; init and exit pick it up in order.
 */

import { sysfs } from "libsys/fs";
import { Err, Ok, Result, unwrap } from "libsys/result";
import { attribute, defineKType, encode, KObject } from "../../kernel/kobject";
import { error as ksetError, KSet, RootDeclaration } from "../../kernel/kset";
import { Level, printk } from "../../kernel/printk";

export interface Device {
	label: string
}

export interface Health {
	errors: number
}

export namespace error {
	export class NoSuchDevice extends Error {
		name: string = 'NoSuchDevice';
		constructor(readonly label: string) { super(`No such device '${label}'`) }
	}
	export class InvalidValue extends Error {
		name: string = 'InvalidValue';
		constructor(readonly value: string) { super(`'${value}' is not a valid value`) }
	}
}

const textDecoder = new TextDecoder();

export const ktypes = {
	devices: unwrap(defineKType({
		name: 'devices',
		attributes: [],
	})),

	device: unwrap(defineKType<Device>({
		name: 'device',
		defaults: () => ({ label: '' }),
		attributes: [
			attribute<Device>('label', sysfs.attr.Mode.ReadOnly, {
				show: (kobj) => Ok(encode(`${kobj.payload.label}\n`)),
			}),
		],
		release: (kobj) => printk(Level.Info, `btrfs: device '${kobj.payload.label}' released`),
	})),

	health: unwrap(defineKType<Health>({
		name: 'health',
		defaults: () => ({ errors: 0 }),
		attributes: [
			attribute<Health>('errors', sysfs.attr.Mode.ReadWrite, {
				show: (kobj) => Ok(encode(`${kobj.payload.errors}\n`)),
				store: (kobj, buffer) => {
					const text = textDecoder.decode(buffer).trim();
					const errors = Number(text);
					if (!/^\d+$/.test(text) || !Number.isSafeInteger(errors))
						return Err(new error.InvalidValue(text));

					kobj.payload.errors = errors;
					return Ok(undefined);
				},
			}),
		],
	})),

	info: unwrap(defineKType({
		name: 'info',
		attributes: [
			attribute('num_devices', sysfs.attr.Mode.ReadOnly, {
				show: (kobj) => {
					const devices = kobj.kset.lookup('devices');
					return Ok(encode(`${devices ? devices.children.size : 0}\n`));
				},
			}),
		],
	})),
};

export const layout: ReadonlyArray<RootDeclaration> = [
	{ name: 'devices', ktype: ktypes.devices },
	{ name: 'health', ktype: ktypes.health },
	{ name: 'info', ktype: ktypes.info },
];

export class BtrfsSysfs {
	/// Creator references of the devices, dropped by killDevice.
	private readonly owned: Map<string, KObject<Device>> = new Map();

	private constructor(
		readonly kset: KSet,
		readonly roots: ReadonlyArray<KObject>,
		readonly devices: KObject
	) { }

	get deviceLabels(): Array<string> {
		return [...this.owned.keys()];
	}

	static init(kset: KSet): Result<BtrfsSysfs, ksetError.InitFailed> {
		const roots = kset.initialize(layout);
		if (!roots.ok)
			return roots;

		// Same order as layout.
		const [devices] = roots.value;
		printk(Level.Info, `btrfs: sysfs ready under '${kset.mountpoint}'`);
		return Ok(new BtrfsSysfs(kset, roots.value, devices));
	}

	createDevice(label: string): Result<KObject<Device>> {
		const device = this.kset.create(label, ktypes.device, { parent: this.devices, payload: { label } });
		if (!device.ok)
			return device;

		this.owned.set(label, device.value);
		printk(Level.Info, `btrfs: device '${label}' added`);
		return device;
	}

	killDevice(label: string): Result<undefined> {
		const device = this.owned.get(label);
		if (device == undefined)
			return Err(new error.NoSuchDevice(label));

		this.owned.delete(label);
		const r = this.kset.destroy(device);
		if (!r.ok)
			return r;

		return Ok(undefined);
	}

	/// Devices go first, then the roots in reverse creation order.
	exit(): Result<undefined> {
		for (const label of [...this.owned.keys()]) {
			const r = this.killDevice(label);
			if (!r.ok)
				return r;
		}

		return this.kset.exit();
	}
}
