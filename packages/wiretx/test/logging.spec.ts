import { expect } from 'chai';
import { format } from 'node:util';
import debug from 'debug';
import { ConnectionSupervisor, disableLogging, enableLogging, isLoggingEnabled } from '../src/index.js';
import { SimulatedBackend } from '../src/testing/index.js';

describe('Logging', () => {
	const originalLog = debug.log;

	afterEach(() => {
		disableLogging();
		debug.log = originalLog;
	});

	it('enables namespaces by pattern', () => {
		enableLogging('wiretx:tracker');
		void expect(isLoggingEnabled('tracker')).to.be.true;
		void expect(isLoggingEnabled('supervisor')).to.be.false;

		disableLogging();
		void expect(isLoggingEnabled('tracker')).to.be.false;
	});

	it('logs the reason of a disconnect on the supervisor error namespace', async () => {
		const lines: string[] = [];
		enableLogging('wiretx:supervisor:error', (...args: unknown[]) => {
			lines.push(format(...args));
		});

		const supervisor = new ConnectionSupervisor(new SimulatedBackend());
		supervisor.requestTermination(new Error('test-reset'));
		await supervisor.whenTerminated();

		expect(lines).to.have.lengthOf(1);
		expect(lines[0]).to.contain('disconnected: test-reset');
	});
});
