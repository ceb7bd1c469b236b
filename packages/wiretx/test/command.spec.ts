import { expect } from 'chai';
import { categorizeCommand, categorizeCallerCommand, MisuseError } from '../src/index.js';
import { savepointSql, releaseSql, rollbackToSql } from '../src/core/command.js';

describe('Command categorization', () => {
	it('recognizes transaction boundaries by their leading keywords', () => {
		expect(categorizeCommand('BEGIN')).to.equal('begin');
		expect(categorizeCommand('begin isolation level serializable')).to.equal('begin');
		expect(categorizeCommand('START TRANSACTION READ ONLY')).to.equal('begin');
		expect(categorizeCommand('COMMIT')).to.equal('commit');
		expect(categorizeCommand('end;')).to.equal('commit');
		expect(categorizeCommand('ROLLBACK')).to.equal('rollback');
		expect(categorizeCommand('abort work')).to.equal('rollback');
	});

	it('distinguishes ROLLBACK TO from ROLLBACK', () => {
		expect(categorizeCommand('ROLLBACK TO SAVEPOINT sp')).to.equal('rollback_to');
		expect(categorizeCommand('rollback transaction to sp')).to.equal('rollback_to');
		expect(categorizeCommand('ROLLBACK WORK')).to.equal('rollback');
	});

	it('recognizes savepoint statements', () => {
		expect(categorizeCommand('SAVEPOINT sp')).to.equal('savepoint');
		expect(categorizeCommand('RELEASE SAVEPOINT sp')).to.equal('release');
		expect(categorizeCommand('release sp')).to.equal('release');
	});

	it('treats two-phase commands and everything else as statements', () => {
		expect(categorizeCommand("COMMIT PREPARED 'gid'")).to.equal('statement');
		expect(categorizeCommand("ROLLBACK PREPARED 'gid'")).to.equal('statement');
		expect(categorizeCommand('START something')).to.equal('statement');
		expect(categorizeCommand('SELECT 1')).to.equal('statement');
		expect(categorizeCommand('')).to.equal('statement');
	});

	it('skips leading comments', () => {
		expect(categorizeCommand('-- note\nBEGIN')).to.equal('begin');
		expect(categorizeCommand('/* hint */ COMMIT')).to.equal('commit');
	});

	it('treats caller-issued boundaries as statements under the strict strategy', () => {
		expect(categorizeCallerCommand('BEGIN', 'strict')).to.equal('statement');
		expect(categorizeCallerCommand('COMMIT', 'strict')).to.equal('statement');
		expect(categorizeCallerCommand('ROLLBACK', 'strict')).to.equal('statement');
		expect(categorizeCallerCommand('ROLLBACK TO SAVEPOINT sp', 'strict')).to.equal('rollback_to');
		expect(categorizeCallerCommand('SAVEPOINT sp', 'strict')).to.equal('savepoint');
	});

	it('keeps caller-issued boundaries under the naive strategy', () => {
		expect(categorizeCallerCommand('BEGIN', 'naive')).to.equal('begin');
		expect(categorizeCallerCommand('COMMIT', 'naive')).to.equal('commit');
		expect(categorizeCallerCommand('ROLLBACK', 'naive')).to.equal('rollback');
	});

	it('builds savepoint statements for valid identifiers only', () => {
		expect(savepointSql('wiretx_query')).to.equal('SAVEPOINT wiretx_query');
		expect(releaseSql('sp_2')).to.equal('RELEASE SAVEPOINT sp_2');
		expect(rollbackToSql('sp')).to.equal('ROLLBACK TO SAVEPOINT sp');
		expect(() => savepointSql('sp; DROP TABLE t')).to.throw(MisuseError, 'Invalid savepoint name');
		expect(() => releaseSql('1sp')).to.throw(MisuseError);
	});
});
