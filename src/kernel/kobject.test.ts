import { describe, expect, it, vi } from "vitest";
import { sysfs } from "libsys/fs";
import { Ok, unwrap } from "libsys/result";
import { krnlfs } from "./fs";
import { attribute, defineKType, encode, error, KObject, State } from "./kobject";
import { KSet } from "./kset";

const show = () => Ok(encode('x\n'));
const store = () => Ok(undefined);

describe("defineKType", () => {
	it("rejects two attributes with the same name", () => {
		const r = defineKType({
			name: 'dup',
			attributes: [
				attribute('x', sysfs.attr.Mode.ReadOnly, { show }),
				attribute('x', sysfs.attr.Mode.ReadOnly, { show }),
			],
		});

		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error).toBeInstanceOf(error.ValidationError);
		expect(r.error.ktype).toBe('dup');
		expect(r.error.issues).toEqual(["attribute 'x' is declared twice"]);
	});

	it("rejects a read-write attribute without store", () => {
		const r = defineKType({
			name: 't',
			attributes: [attribute('y', sysfs.attr.Mode.ReadWrite, { show })],
		});

		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error.issues).toEqual(["read-write attribute 'y' has no store"]);
	});

	it("rejects a read-only attribute that carries a store", () => {
		const r = defineKType({
			name: 't',
			attributes: [attribute('z', sysfs.attr.Mode.ReadOnly, { show, store })],
		});

		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error.issues).toEqual(["read-only attribute 'z' has a store"]);
	});

	it("collects every issue of a declaration", () => {
		const r = defineKType({
			name: '',
			attributes: [
				attribute('a/b', sysfs.attr.Mode.ReadOnly, { show }),
				attribute('..', sysfs.attr.Mode.ReadWrite, { show, store }),
			],
		});

		expect(r.ok).toBe(false);
		if (r.ok) return;
		expect(r.error.issues).toEqual([
			"'' is not a valid ktype name",
			"'a/b' is not a valid attribute name",
			"'..' is not a valid attribute name",
		]);
	});

	it("accepts write-only attributes", () => {
		const r = defineKType({
			name: 'wo',
			attributes: [attribute('trigger', sysfs.attr.Mode.ReadWrite, { store })],
		});

		expect(r.ok).toBe(true);
	});

	it("builds a frozen type with attributes in declaration order", () => {
		const ktype = unwrap(defineKType({
			name: 'info',
			attributes: [
				attribute('b', sysfs.attr.Mode.ReadOnly, { show }),
				attribute('a', sysfs.attr.Mode.ReadWrite, { show, store }),
			],
		}));

		expect(ktype.attributes.map((attr) => attr.name)).toEqual(['b', 'a']);
		expect(Object.isFrozen(ktype)).toBe(true);
		expect(Object.isFrozen(ktype.attributes)).toBe(true);
		expect(Object.isFrozen(ktype.attributes[0])).toBe(true);
		expect(ktype.attribute('a')?.mode).toBe(sysfs.attr.Mode.ReadWrite);
		expect(ktype.attribute('missing')).toBeUndefined();
		expect(ktype.defaults()).toBeUndefined();
	});

	it("uses the declared payload defaults", () => {
		const ktype = unwrap(defineKType<{ count: number }>({
			name: 'counter',
			attributes: [],
			defaults: () => ({ count: 3 }),
		}));

		expect(ktype.defaults()).toEqual({ count: 3 });
		expect(ktype.defaults()).not.toBe(ktype.defaults());
	});
});

describe("KObject", () => {
	const ktype = unwrap(defineKType({ name: 'plain', attributes: [] }));
	const kset = new KSet({ name: 'test', mountpoint: '/sys/fs/test', renderer: new krnlfs.Filesystem() });

	it("starts with one reference and releases on the last put", () => {
		const kobj = new KObject('n', ktype, kset, undefined);
		const release = vi.fn();

		expect(kobj.refcount).toBe(1);
		expect(unwrap(kobj.get())).toBe(kobj);
		expect(kobj.refcount).toBe(2);

		expect(unwrap(kobj.put(release))).toBe(false);
		expect(release).not.toHaveBeenCalled();

		expect(unwrap(kobj.put(release))).toBe(true);
		expect(release).toHaveBeenCalledTimes(1);
		expect(release).toHaveBeenCalledWith(kobj);
		expect(kobj.state).toBe(State.Destroyed);
		expect(kobj.live).toBe(false);
	});

	it("refuses references once destroyed", () => {
		const kobj = new KObject('n', ktype, kset, undefined);
		const release = vi.fn();
		unwrap(kobj.put(release));

		const underflow = kobj.put(release);
		expect(underflow.ok).toBe(false);
		if (!underflow.ok)
			expect(underflow.error).toBeInstanceOf(error.RefcountUnderflow);

		const get = kobj.get();
		expect(get.ok).toBe(false);
		if (!get.ok)
			expect(get.error).toBeInstanceOf(error.NodeDestroyed);

		expect(release).toHaveBeenCalledTimes(1);
	});

	it("keeps pinned references apart from put", () => {
		const kobj = new KObject('n', ktype, kset, undefined);
		const release = vi.fn();

		unwrap(kobj.pin());
		expect(kobj.refcount).toBe(2);
		expect(kobj.pinned).toBe(1);

		expect(unwrap(kobj.put(release))).toBe(false);
		const extra = kobj.put(release);
		expect(extra.ok).toBe(false);
		if (!extra.ok)
			expect(extra.error).toBeInstanceOf(error.RefcountUnderflow);
		expect(release).not.toHaveBeenCalled();

		expect(unwrap(kobj.unpin(release))).toBe(true);
		expect(release).toHaveBeenCalledTimes(1);
		expect(kobj.unpin(release).ok).toBe(false);
	});

	it("derives its path from the parent chain", () => {
		const parent = new KObject('devices', ktype, kset, undefined);
		const child = new KObject('sda', ktype, kset, undefined, parent);

		expect(parent.path()).toBe('/sys/fs/test/devices');
		expect(child.path()).toBe('/sys/fs/test/devices/sda');
	});
});
