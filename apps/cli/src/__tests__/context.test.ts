/**
 * Global Option Tests
 */

import { Command } from 'commander';
import { CloudApiClient } from '@cloudctl/cloud-api';
import { apiContext, createApiClient, globalOptions } from '../lib/context.js';

function parse(args: string[]): Command {
  const program = new Command()
    .option('--config <path>')
    .option('--context <name>')
    .option('--url <url>')
    .option('--api-token <token>');
  const sub = program.command('health').action(() => undefined);
  program.parse(['node', 'cloudctl', ...args]);
  return sub;
}

describe('globalOptions', () => {
  it('should read program options from a subcommand', () => {
    const command = parse(['--url', 'https://api.example.test/cloud', '--api-token', 'test-token', 'health']);

    expect(globalOptions(command)).toEqual({ url: 'https://api.example.test/cloud', apiToken: 'test-token' });
  });
});

describe('apiContext', () => {
  it('should prefer flags over the environment', () => {
    const context = apiContext(
      { url: 'https://flag.example.test/cloud/' },
      { CLOUDCTL_URL: 'https://env.example.test/cloud', CLOUDCTL_APITOKEN: 'env-token' },
    );

    expect(context.url).toBe('https://flag.example.test/cloud');
    expect(context.apiToken).toBe('env-token');
  });

  it('should reject an invalid url', () => {
    expect(() => apiContext({ url: 'localhost:8080' }, {})).toThrow(
      'invalid url: localhost:8080, must be in the form scheme://host[:port]/basepath',
    );
  });
});

describe('createApiClient', () => {
  it('should build a client for the context', () => {
    expect(createApiClient({ name: 'default', url: 'https://api.example.test/cloud' })).toBeInstanceOf(CloudApiClient);
  });
});
