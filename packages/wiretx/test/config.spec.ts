/**
 * Tests for configuration loading.
 */

import { expect } from 'chai';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	DEFAULT_CONFIG,
	MisuseError,
	WiretxError,
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
	mergeConfig,
	resolveDisconnectPolicy,
	validateConfig,
} from '../src/index.js';

describe('Configuration', () => {
	describe('DEFAULT_CONFIG', () => {
		it('uses strict transactions and never disconnects', () => {
			expect(DEFAULT_CONFIG.transactions).to.equal('strict');
			expect(DEFAULT_CONFIG.disconnectOnErrorCodes).to.deep.equal([]);
			expect(DEFAULT_CONFIG.logging).to.deep.equal({});
		});
	});

	describe('loadEnvConfig', () => {
		it('reads the transaction strategy', () => {
			expect(loadEnvConfig({ WIRETX_TRANSACTIONS: ' Naive ' })).to.deep.equal({ transactions: 'naive' });
		});

		it('splits the disconnect codes', () => {
			const config = loadEnvConfig({ WIRETX_DISCONNECT_ON_ERROR_CODES: 'read_only_sql_transaction, 57P01,' });
			expect(config.disconnectOnErrorCodes).to.deep.equal(['read_only_sql_transaction', '57P01']);
		});

		it('reads the logging namespaces', () => {
			expect(loadEnvConfig({ WIRETX_LOG: 'wiretx:*:error' }).logging).to.deep.equal({ namespaces: 'wiretx:*:error' });
		});

		it('rejects an unknown strategy', () => {
			expect(() => loadEnvConfig({ WIRETX_TRANSACTIONS: 'lenient' })).to.throw(MisuseError, 'Invalid WIRETX_TRANSACTIONS: lenient');
		});

		it('returns nothing for an empty environment', () => {
			expect(loadEnvConfig({})).to.deep.equal({});
		});
	});

	describe('loadConfigFile', () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), 'wiretx-config-'));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it('reads a JSON config file', () => {
			const path = join(dir, 'wiretx.json');
			writeFileSync(path, JSON.stringify({ transactions: 'naive', disconnectOnErrorCodes: ['25006'] }));
			expect(loadConfigFile(path)).to.deep.equal({ transactions: 'naive', disconnectOnErrorCodes: ['25006'] });
		});

		it('returns nothing for a missing file', () => {
			expect(loadConfigFile(join(dir, 'missing.json'))).to.deep.equal({});
		});

		it('rejects a file that is not JSON', () => {
			const path = join(dir, 'broken.json');
			writeFileSync(path, '{ transactions: ');
			expect(() => loadConfigFile(path)).to.throw(WiretxError, 'Failed to parse config file');
		});

		it('rejects misshapen disconnect codes', () => {
			const path = join(dir, 'codes.json');
			writeFileSync(path, JSON.stringify({ disconnectOnErrorCodes: 'read_only_sql_transaction' }));
			expect(() => loadConfigFile(path)).to.throw(WiretxError, 'must be an array of strings');
		});

		it('lets the environment and overrides win over the file', () => {
			const path = join(dir, 'wiretx.json');
			writeFileSync(path, JSON.stringify({ transactions: 'naive', disconnectOnErrorCodes: ['25006'] }));

			const config = loadConfig({
				configPath: path,
				env: { WIRETX_DISCONNECT_ON_ERROR_CODES: 'admin_shutdown' },
				overrides: { logging: { namespaces: 'wiretx:supervisor:*' } },
			});

			expect(config).to.deep.equal({
				transactions: 'naive',
				disconnectOnErrorCodes: ['admin_shutdown'],
				logging: { namespaces: 'wiretx:supervisor:*' },
			});
		});
	});

	describe('loadConfig', () => {
		it('returns defaults when nothing is configured', () => {
			expect(loadConfig({ env: {} })).to.deep.equal(DEFAULT_CONFIG);
		});

		it('applies overrides', () => {
			const config = loadConfig({ env: {}, overrides: { transactions: 'naive' } });
			expect(config.transactions).to.equal('naive');
		});

		it('rejects unknown condition names', () => {
			expect(() => loadConfig({ env: {}, overrides: { disconnectOnErrorCodes: ['not_a_condition'] } }))
				.to.throw(MisuseError, 'Unknown error code in disconnect policy: not_a_condition');
		});
	});

	describe('mergeConfig', () => {
		it('does not share arrays with its inputs', () => {
			const merged = mergeConfig(DEFAULT_CONFIG, {});
			merged.disconnectOnErrorCodes.push('25006');
			expect(DEFAULT_CONFIG.disconnectOnErrorCodes).to.deep.equal([]);
		});
	});

	describe('resolveDisconnectPolicy', () => {
		it('normalizes every entry to a SQLSTATE', () => {
			const config = validateConfig(mergeConfig(DEFAULT_CONFIG, {
				disconnectOnErrorCodes: ['read_only_sql_transaction', '57p01'],
			}));
			expect(resolveDisconnectPolicy(config).toArray()).to.deep.equal(['25006', '57P01']);
		});
	});
});
