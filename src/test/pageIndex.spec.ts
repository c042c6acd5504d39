/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import { strict as assert } from "node:assert";

import { ReentrantIndexMutationError } from "../errors.js";
import { PageIndex, type IIndexSubscriber } from "../pageIndex.js";

class RecordingSubscriber implements IIndexSubscriber {
	constructor(
		private readonly name: string,
		private readonly log: string[],
	) {}

	public onIndexChanged(index: number): void {
		this.log.push(`${this.name}:${index}`);
	}
}

describe("PageIndex", () => {
	let index: PageIndex;
	let log: string[];

	beforeEach(() => {
		index = new PageIndex();
		log = [];
	});

	it("starts at zero", () => {
		assert.strictEqual(index.currentIndex, 0);
	});

	it("notifies every subscriber in subscription order before returning", () => {
		index.addSub(new RecordingSubscriber("a", log), new RecordingSubscriber("b", log));
		index.addSub(new RecordingSubscriber("c", log));

		index.set(4);

		assert.deepStrictEqual(log, ["a:4", "b:4", "c:4"]);
		assert.strictEqual(index.currentIndex, 4);
	});

	it("increments and decrements with a notification each", () => {
		index.addSub(new RecordingSubscriber("a", log));

		index.incr();
		index.incr();
		index.decr();

		assert.deepStrictEqual(log, ["a:1", "a:2", "a:1"]);
		assert.strictEqual(index.currentIndex, 1);
	});

	it("notifies a subscriber added twice once per registration", () => {
		const subscriber = new RecordingSubscriber("a", log);
		index.addSub(subscriber, subscriber);

		index.set(2);

		assert.deepStrictEqual(log, ["a:2", "a:2"]);
		assert.strictEqual(index.subscriberCount, 2);
	});

	it("does not check bounds", () => {
		index.decr();
		assert.strictEqual(index.currentIndex, -1);
		index.set(100);
		assert.strictEqual(index.currentIndex, 100);
	});

	it("rejects mutations made from inside a subscriber", () => {
		let reentered = false;
		index.addSub({
			onIndexChanged: () => {
				if (!reentered) {
					reentered = true;
					index.incr();
				}
			},
		});
		index.addSub(new RecordingSubscriber("a", log));

		assert.throws(() => index.set(1), ReentrantIndexMutationError);
		assert.strictEqual(index.currentIndex, 1);
		assert.deepStrictEqual(log, []);

		index.set(2);
		assert.deepStrictEqual(log, ["a:2"]);
	});
});
