/**
 * Sample API records
 */

export const organizationRecord = {
  id: '1',
  slug: 'acme',
  name: 'Acme',
  dateCreated: '2024-01-15T10:00:00Z',
  features: ['discover'],
}

export const teamRecord = {
  id: '10',
  slug: 'platform',
  name: 'Platform',
  memberCount: 4,
}

export const projectRecord = {
  id: '100',
  slug: 'backend',
  name: 'Backend',
  platform: 'node',
  organization: { id: '1', slug: 'acme', name: 'Acme' },
  isBookmarked: false,
}

export const issueRecord = {
  id: '5001',
  shortId: 'BACKEND-1',
  title: 'TypeError: cannot read properties of undefined',
  culprit: 'handler(src/routes.ts)',
  status: 'unresolved',
  level: 'error',
  count: '42',
  userCount: 3,
  project: { id: '100', slug: 'backend', name: 'Backend' },
  'first seen release': '1.0.0',
}

export const eventRecord = {
  id: '9001',
  eventID: 'a1b2c3d4e5f60718293a4b5c6d7e8f90',
  groupID: '5001',
  title: 'TypeError: cannot read properties of undefined',
  message: '',
  dateCreated: '2024-03-01T12:30:00Z',
  tags: [
    { key: 'environment', value: 'production' },
    { key: 'level', value: 'error' },
    { key: 'release', value: '1.0.0' },
  ],
}

export const integrationRecord = {
  id: '77',
  name: 'acme-workspace',
  domainName: 'acme.slack.com',
  status: 'active',
  provider: { key: 'slack', slug: 'slack', name: 'Slack' },
}
