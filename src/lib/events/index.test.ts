import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	trigger: (e: { tokenId: string; pnlPct: number }) => void;
	failure: (err: Error) => void;
	stop: () => void;
};

describe("TypedEmitter", () => {
	it("emit() passes arguments to every registered handler", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const first = vi.fn();
		const second = vi.fn();

		emitter.on("trigger", first).on("trigger", second);
		emitter.emit("trigger", { tokenId: "tok-1", pnlPct: -25 });

		expect(first).toHaveBeenCalledWith({ tokenId: "tok-1", pnlPct: -25 });
		expect(second).toHaveBeenCalledTimes(1);
	});

	it("emit() returns false when nobody listens", () => {
		const emitter = new TypedEmitter<TestEvents>();

		expect(emitter.emit("stop")).toBe(false);
	});

	it("off() removes a handler", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const removed = vi.fn();
		const kept = vi.fn();

		emitter.on("stop", removed).on("stop", kept).off("stop", removed);
		emitter.emit("stop");

		expect(removed).not.toHaveBeenCalled();
		expect(kept).toHaveBeenCalledTimes(1);
	});

	it("listenerCount() and removeAllListeners() track registrations", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("failure", vi.fn()).on("failure", vi.fn()).on("stop", vi.fn());

		expect(emitter.listenerCount("failure")).toBe(2);

		emitter.removeAllListeners("failure");
		expect(emitter.listenerCount("failure")).toBe(0);
		expect(emitter.listenerCount("stop")).toBe(1);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("stop")).toBe(0);
	});

	it("a throwing handler propagates to the emitter", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("stop", () => {
			throw new Error("boom");
		});

		expect(() => emitter.emit("stop")).toThrow("boom");
	});
});
