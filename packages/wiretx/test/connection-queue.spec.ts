import { expect } from 'chai';
import { ConnectionQueue, ConnectionTerminatedError } from '../src/index.js';
import { deferred } from '../src/core/deferred.js';

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (error) {
		return error;
	}
	throw new Error('expected the promise to reject');
}

describe('ConnectionQueue', () => {
	it('admits callers one at a time in arrival order', async () => {
		const queue = new ConnectionQueue(deferred<ConnectionTerminatedError>().promise);
		const order: string[] = [];

		const releaseFirst = await queue.acquire();
		const second = queue.acquire().then(release => {
			order.push('second');
			return release;
		});
		order.push('first');
		expect(queue.waiting).to.equal(1);

		releaseFirst();
		const releaseSecond = await second;
		releaseSecond();

		expect(order).to.deep.equal(['first', 'second']);
		expect(queue.waiting).to.equal(0);
	});

	it('keeps nothing per admitted caller while the connection stays open', async () => {
		const queue = new ConnectionQueue(deferred<ConnectionTerminatedError>().promise);

		for (let i = 0; i < 1000; i++) {
			const release = await queue.acquire();
			release();
		}

		expect(queue.waiting).to.equal(0);
	});

	it('rejects waiting and later callers with the termination event', async () => {
		const terminated = deferred<ConnectionTerminatedError>();
		const queue = new ConnectionQueue(terminated.promise);
		const release = await queue.acquire();
		const waiter = queue.acquire();

		const event = new ConnectionTerminatedError(new Error('test-reset'));
		terminated.resolve(event);

		expect(await rejection(waiter)).to.equal(event);
		expect(queue.waiting).to.equal(0);
		expect(await rejection(queue.acquire())).to.equal(event);
		release();
	});
});
