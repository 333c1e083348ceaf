import { expect } from 'chai';
import { parseCliArgs, validateCliOptions } from '../app/src/utils/cli-parser';

const argv = (...args: string[]): string[] => ['node', 'oracle', ...args];

describe('cli parser', () => {
  it('parses flags and values', () => {
    expect(parseCliArgs(argv('--config=conf/a.json', '--mode=consumer', '--dry-run', '-v', '--log=out.log'))).to.deep.equal({
      configPath: 'conf/a.json',
      mode: 'consumer',
      isDryRun: true,
      verbose: true,
      logFile: 'out.log',
    });
  });

  it('defaults everything off', () => {
    expect(parseCliArgs(argv())).to.deep.equal({
      configPath: null,
      mode: null,
      isDryRun: false,
      verbose: false,
      logFile: null,
    });
  });

  it('treats empty values as absent', () => {
    expect(parseCliArgs(argv('--config=')).configPath).to.equal(null);
  });

  it('reports unknown modes and arguments', () => {
    expect(validateCliOptions(argv('--mode=relay'))).to.equal('Unknown mode "relay"');
    expect(validateCliOptions(argv('--daemon'))).to.equal('Unknown argument "--daemon"');
    expect(validateCliOptions(argv('--mode=producer', '--dryrun'))).to.equal(null);
  });
});
