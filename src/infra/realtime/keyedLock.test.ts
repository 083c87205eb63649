import { describe, expect, it } from "vitest";

import { KeyedLock } from "./keyedLock";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedLock", () => {
	it("runs tasks for the same key one after another", async () => {
		const lock = new KeyedLock();
		const log: string[] = [];

		const task = (name: string) => async () => {
			log.push(`${name}:start`);
			await tick();
			log.push(`${name}:end`);
			return name;
		};

		const results = await Promise.all([
			lock.run("s1", task("a")),
			lock.run("s1", task("b")),
		]);

		expect(results).toEqual(["a", "b"]);
		expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
	});

	it("lets different keys interleave", async () => {
		const lock = new KeyedLock();
		const log: string[] = [];

		const task = (name: string) => async () => {
			log.push(`${name}:start`);
			await tick();
			log.push(`${name}:end`);
		};

		await Promise.all([lock.run("s1", task("a")), lock.run("s2", task("b"))]);

		expect(log.slice(0, 2)).toEqual(["a:start", "b:start"]);
	});

	it("releases the key after a failing task", async () => {
		const lock = new KeyedLock();

		await expect(
			lock.run("s1", async () => {
				throw new Error("boom");
			})
		).rejects.toThrow("boom");

		await expect(lock.run("s1", async () => "next")).resolves.toBe("next");
	});
});
