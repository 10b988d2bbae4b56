import { describe, expect, it, vi } from "vitest";
import { sysfs } from "libsys/fs";
import { Err, Ok, Result, unwrap } from "libsys/result";
import { Dispatcher, error } from "./dispatch";
import { krnlfs } from "./fs";
import { attribute, defineKType, encode, error as kobjectError } from "./kobject";
import { KSet } from "./kset";

const textDecoder = new TextDecoder();

function setup() {
	const fs = new krnlfs.Filesystem();
	const kset = new KSet({ name: 'test', renderer: fs });
	return { fs, kset, dispatcher: new Dispatcher(kset, fs) };
}

describe("Dispatcher", () => {
	it("reads a read-only attribute and releases on destroy", async () => {
		const { fs, kset, dispatcher } = setup();
		const release = vi.fn();
		const info = unwrap(defineKType({
			name: 'info',
			attributes: [attribute('num_devices', sysfs.attr.Mode.ReadOnly, { show: () => Ok(encode('0')) })],
			release,
		}));
		const kobj = unwrap(kset.create('info', info));

		const data = unwrap(await dispatcher.onRead('info/num_devices'));
		expect(textDecoder.decode(data)).toBe('0');
		expect(kobj.refcount).toBe(1);

		unwrap(kset.destroy(kobj));
		expect(release).toHaveBeenCalledTimes(1);
		expect(fs.isPublished(kobj)).toBe(false);
		expect(kset.destroy(kobj).ok).toBe(false);
	});

	it("resolves nested paths and keeps detached children alive", async () => {
		const { kset, dispatcher } = setup();
		const dir = unwrap(defineKType({ name: 'devices', attributes: [] }));
		const device = unwrap(defineKType<{ label: string }>({
			name: 'device',
			defaults: () => ({ label: '' }),
			attributes: [
				attribute<{ label: string }>('label', sysfs.attr.Mode.ReadOnly, { show: (kobj) => Ok(encode(kobj.payload.label)) }),
			],
		}));
		const devices = unwrap(kset.create('devices', dir));
		const sda = unwrap(kset.create('sda', device, { parent: devices, payload: { label: 'sda' } }));

		expect(textDecoder.decode(unwrap(await dispatcher.onRead('devices/sda/label')))).toBe('sda');

		unwrap(kset.destroy(devices));

		expect(sda.live).toBe(true);
		expect(sda.refcount).toBe(1);
		expect(sda.parent).toBeUndefined();
		const gone = await dispatcher.onRead('devices/sda/label');
		expect(gone.ok).toBe(false);
		if (!gone.ok)
			expect(gone.error).toBeInstanceOf(krnlfs.error.ParentDoesntExist);
	});

	it("refuses to read write-only and write read-only attributes", async () => {
		const { kset, dispatcher } = setup();
		const payload = { value: 'initial' };
		const show = vi.fn(() => Ok(encode(payload.value)));
		const store = vi.fn((_kobj: unknown, buffer: Uint8Array) => {
			payload.value = textDecoder.decode(buffer);
			return Ok(undefined);
		});
		const ktype = unwrap(defineKType({
			name: 'caps',
			attributes: [
				attribute('ro', sysfs.attr.Mode.ReadOnly, { show }),
				attribute('wo', sysfs.attr.Mode.ReadWrite, { store }),
			],
		}));
		const kobj = unwrap(kset.create('caps', ktype));

		const read = await dispatcher.onRead('caps/wo');
		expect(read.ok).toBe(false);
		if (!read.ok)
			expect(read.error).toBeInstanceOf(error.NotReadable);

		const write = await dispatcher.onWrite('caps/ro', encode('changed'));
		expect(write.ok).toBe(false);
		if (!write.ok)
			expect(write.error).toBeInstanceOf(error.NotWritable);

		expect(show).not.toHaveBeenCalled();
		expect(store).not.toHaveBeenCalled();
		expect(payload.value).toBe('initial');
		expect(kobj.refcount).toBe(1);
	});

	it("hands the written bytes to store", async () => {
		const { kset, dispatcher } = setup();
		const ktype = unwrap(defineKType<{ value: string }>({
			name: 'cell',
			defaults: () => ({ value: '' }),
			attributes: [
				attribute<{ value: string }>('value', sysfs.attr.Mode.ReadWrite, {
					show: (kobj) => Ok(encode(kobj.payload.value)),
					store: (kobj, buffer) => {
						kobj.payload.value = textDecoder.decode(buffer);
						return Ok(undefined);
					},
				}),
			],
		}));
		const kobj = unwrap(kset.create('cell', ktype));

		unwrap(await dispatcher.onWrite('cell/value', encode('42')));

		expect(kobj.payload.value).toBe('42');
		expect(textDecoder.decode(unwrap(await dispatcher.onRead('cell/value')))).toBe('42');
	});

	it("does not release a node while a callback is running", async () => {
		const { kset, dispatcher } = setup();
		const release = vi.fn();
		let finish: (r: Result<Uint8Array>) => void = () => { };
		const ktype = unwrap(defineKType({
			name: 'slow',
			attributes: [
				attribute('value', sysfs.attr.Mode.ReadOnly, {
					show: () => new Promise<Result<Uint8Array>>((resolve) => { finish = resolve }),
				}),
			],
			release,
		}));
		const kobj = unwrap(kset.create('slow', ktype));

		const pending = dispatcher.onRead('slow/value');
		expect(kobj.refcount).toBe(2);

		expect(unwrap(kset.destroy(kobj))).toBe(false);
		expect(release).not.toHaveBeenCalled();
		expect(kobj.live).toBe(true);

		finish(Ok(encode('done')));
		expect(textDecoder.decode(unwrap(await pending))).toBe('done');
		expect(release).toHaveBeenCalledTimes(1);
		expect(kobj.live).toBe(false);
	});

	it("keeps the pinned reference away from an extra destroy", async () => {
		const { kset, dispatcher } = setup();
		const release = vi.fn();
		let finish: (r: Result<Uint8Array>) => void = () => { };
		const ktype = unwrap(defineKType({
			name: 'slow',
			attributes: [
				attribute('value', sysfs.attr.Mode.ReadOnly, {
					show: () => new Promise<Result<Uint8Array>>((resolve) => { finish = resolve }),
				}),
			],
			release,
		}));
		const kobj = unwrap(kset.create('slow', ktype));

		const pending = dispatcher.onRead('slow/value');
		expect(kobj.pinned).toBe(1);

		expect(unwrap(kset.destroy(kobj))).toBe(false);
		const extra = kset.destroy(kobj);
		expect(extra.ok).toBe(false);
		if (!extra.ok)
			expect(extra.error).toBeInstanceOf(kobjectError.RefcountUnderflow);
		expect(release).not.toHaveBeenCalled();
		expect(kobj.live).toBe(true);

		finish(Ok(encode('done')));
		const r = await pending;
		expect(r.ok).toBe(true);
		expect(release).toHaveBeenCalledTimes(1);
		expect(kobj.pinned).toBe(0);
		expect(kobj.refcount).toBe(0);
	});

	it("passes callback errors through and wraps thrown ones", async () => {
		const { kset, dispatcher } = setup();
		const failure = new Error('device busy');
		const ktype = unwrap(defineKType({
			name: 'flaky',
			attributes: [
				attribute('fails', sysfs.attr.Mode.ReadOnly, { show: vi.fn(() => Err(failure)) }),
				attribute('throws', sysfs.attr.Mode.ReadWrite, {
					store: () => { throw new TypeError('boom') },
				}),
			],
		}));
		const kobj = unwrap(kset.create('flaky', ktype));

		const failed = await dispatcher.onRead('flaky/fails');
		expect(failed.ok).toBe(false);
		if (!failed.ok)
			expect(failed.error).toBe(failure);

		const thrown = await dispatcher.onWrite('flaky/throws', encode('x'));
		expect(thrown.ok).toBe(false);
		if (!thrown.ok) {
			expect(thrown.error).toBeInstanceOf(error.CallbackError);
			expect(thrown.error.cause).toBeInstanceOf(TypeError);
		}

		expect(kobj.refcount).toBe(1);
	});

	it("fails unresolvable tokens without touching any node", async () => {
		const { dispatcher } = setup();

		const r = await dispatcher.onRead('nothing/here');
		expect(r.ok).toBe(false);
		if (!r.ok)
			expect(r.error).toBeInstanceOf(krnlfs.error.ParentDoesntExist);
	});
});
