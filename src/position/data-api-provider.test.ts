import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../lib/logger/index.js";
import { NetworkError, RateLimitError, TimeoutError } from "../shared/errors.js";
import { ethAddress } from "../shared/identifiers.js";
import { DataApiPositionProvider, type FetchFn } from "./data-api-provider.js";

const USER = ethAddress("0x1111111111111111111111111111111111111111");

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json" },
	});
}

function provider(fetchFn: FetchFn): DataApiPositionProvider {
	const created = DataApiPositionProvider.create({
		baseUrl: "https://data.test/",
		user: USER,
		logger: silentLogger(),
		fetchFn,
	});
	if (!created.ok) throw created.error;
	return created.value;
}

describe("DataApiPositionProvider", () => {
	it("queries /positions with threshold, limit, sort order and user", async () => {
		const fetchFn = vi.fn<FetchFn>(() => Promise.resolve(jsonResponse([])));

		await provider(fetchFn).fetchPositions(0.5);

		expect(fetchFn).toHaveBeenCalledTimes(1);
		const url = new URL(fetchFn.mock.calls[0]?.[0] ?? "");
		expect(url.origin + url.pathname).toBe("https://data.test/positions");
		expect(url.searchParams.get("sizeThreshold")).toBe("0.5");
		expect(url.searchParams.get("limit")).toBe("100");
		expect(url.searchParams.get("sortDirection")).toBe("DESC");
		expect(url.searchParams.get("user")).toBe(USER);
	});

	it("skips malformed records and drops positions below the minimum value", async () => {
		const fetchFn: FetchFn = () =>
			Promise.resolve(
				jsonResponse([
					{
						asset: "tok-1",
						size: "100",
						curPrice: "0.4",
						currentValue: "40",
						initialValue: "50",
					},
					{ title: "missing asset", size: 3 },
					{ asset: "tok-2", size: 1, curPrice: 0.05, currentValue: 0.05 },
					{ asset: "tok-3", size: 10, curPrice: 0.9, currentValue: 9 },
				]),
			);

		const result = await provider(fetchFn).fetchPositions(0.1);

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.positions.map((p) => p.tokenId)).toEqual(["tok-1", "tok-3"]);
			expect(result.value.skipped.map((s) => s.index)).toEqual([1]);
			expect(result.value.belowMinValue).toBe(1);
		}
	});

	it("keeps a position whose value equals the minimum", async () => {
		const fetchFn: FetchFn = () =>
			Promise.resolve(
				jsonResponse([{ asset: "tok-1", size: 1, curPrice: 0.1, currentValue: 0.1 }]),
			);

		const result = await provider(fetchFn).fetchPositions(0.1);

		expect(result.ok && result.value.positions).toHaveLength(1);
	});

	it("classifies HTTP failures", async () => {
		const result = await provider(() => Promise.resolve(jsonResponse({}, 429))).fetchPositions(0);

		expect(!result.ok && result.error).toBeInstanceOf(RateLimitError);
	});

	it("classifies server errors as NetworkError", async () => {
		const result = await provider(() => Promise.resolve(jsonResponse({}, 503))).fetchPositions(0);

		expect(!result.ok && result.error).toBeInstanceOf(NetworkError);
	});

	it("maps an aborted request to TimeoutError", async () => {
		const timeout = new DOMException("The operation was aborted due to timeout", "TimeoutError");
		const result = await provider(() => Promise.reject(timeout)).fetchPositions(0);

		expect(!result.ok && result.error).toBeInstanceOf(TimeoutError);
	});

	it("fails when the payload is not an array", async () => {
		const fetchFn: FetchFn = () => Promise.resolve(jsonResponse({ error: "bad user" }));
		const result = await provider(fetchFn).fetchPositions(0);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Data API returned a non-array positions payload");
		}
	});

	it("rejects a blank base URL", () => {
		const created = DataApiPositionProvider.create({
			baseUrl: " ",
			user: USER,
			logger: silentLogger(),
		});

		expect(created.ok).toBe(false);
	});
});
