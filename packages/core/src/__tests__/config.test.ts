import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, loadConfluenceConfig, loadJiraConfig, loadRedshiftConfig } from '../config.js';

const redshiftEnv = {
  REDSHIFT_HOST: 'warehouse.example.internal',
  REDSHIFT_DATABASE: 'analytics',
  REDSHIFT_USER: 'reporter',
  REDSHIFT_PASSWORD: 'test-password',
};

describe('loadJiraConfig', () => {
  it('reads credentials and strips trailing slashes', () => {
    const cfg = loadJiraConfig({
      JIRA_URL: 'https://example.atlassian.net/',
      JIRA_EMAIL: 'dev@example.com',
      JIRA_API_TOKEN: 'test-token',
    });
    assert.deepEqual(cfg, {
      baseUrl: 'https://example.atlassian.net',
      email: 'dev@example.com',
      apiToken: 'test-token',
      acceptanceCriteriaField: 'customfield_10000',
    });
  });

  it('honours a custom acceptance criteria field', () => {
    const cfg = loadJiraConfig({
      JIRA_URL: 'https://example.atlassian.net',
      JIRA_EMAIL: 'dev@example.com',
      JIRA_API_TOKEN: 'test-token',
      JIRA_ACCEPTANCE_CRITERIA_FIELD: 'customfield_12345',
    });
    assert.equal(cfg.acceptanceCriteriaField, 'customfield_12345');
  });

  it('names every missing variable', () => {
    assert.throws(
      () => loadJiraConfig({ JIRA_URL: 'https://example.atlassian.net', JIRA_API_TOKEN: '  ' }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepEqual(err.missing, ['JIRA_EMAIL', 'JIRA_API_TOKEN']);
        assert.equal(err.message, 'Jira is not configured. Missing environment variables: JIRA_EMAIL, JIRA_API_TOKEN');
        return true;
      },
    );
  });
});

describe('loadConfluenceConfig', () => {
  const env = {
    CONFLUENCE_URL: 'https://example.atlassian.net',
    CONFLUENCE_USERNAME: 'dev@example.com',
    CONFLUENCE_API_TOKEN: 'test-token',
    CONFLUENCE_PERSONAL_SPACE: '~dev',
  };

  it('defaults to a cloud site', () => {
    assert.equal(loadConfluenceConfig(env).isCloud, true);
  });

  it('turns cloud off for false or 0', () => {
    assert.equal(loadConfluenceConfig({ ...env, CONFLUENCE_IS_CLOUD: 'FALSE' }).isCloud, false);
    assert.equal(loadConfluenceConfig({ ...env, CONFLUENCE_IS_CLOUD: '0' }).isCloud, false);
  });

  it('requires the personal space', () => {
    assert.throws(() => loadConfluenceConfig({ ...env, CONFLUENCE_PERSONAL_SPACE: undefined }), /CONFLUENCE_PERSONAL_SPACE/);
  });
});

describe('loadRedshiftConfig', () => {
  it('defaults the port to 5439', () => {
    assert.deepEqual(loadRedshiftConfig(redshiftEnv), {
      host: 'warehouse.example.internal',
      port: 5439,
      database: 'analytics',
      user: 'reporter',
      password: 'test-password',
    });
  });

  it('reads an explicit port', () => {
    assert.equal(loadRedshiftConfig({ ...redshiftEnv, REDSHIFT_PORT: '5440' }).port, 5440);
  });

  it('rejects an out-of-range port', () => {
    assert.throws(
      () => loadRedshiftConfig({ ...redshiftEnv, REDSHIFT_PORT: '70000' }),
      (err: unknown) => err instanceof ConfigError && err.message === 'Invalid REDSHIFT_PORT "70000". Expected 1-65535.',
    );
  });
});
