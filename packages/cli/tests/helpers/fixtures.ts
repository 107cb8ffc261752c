import {
  InMemoryTransport,
  type InMemoryCollection,
  type InMemoryTransportOptions,
  type ServerInfo,
} from '@computectl/client'

export const modernServer: ServerInfo = { apiVersion: 'v7.20230615', serverVersion: '23.09.1' }
export const legacyServer: ServerInfo = { apiVersion: 'v5.20191215', serverVersion: '19.09' }
export const outdatedServer: ServerInfo = { apiVersion: 'v4.20190615', serverVersion: '19.03' }

export const sessions = [
  {
    session_id: 'sess-01',
    session_name: 'train-resnet',
    status: 'RUNNING',
    status_info: null,
    session_type: 'batch',
    image: 'cuda:12.2',
    owner_email: 'alice@example.com',
    group_name: 'research',
    scaling_group: 'default',
    occupied_slots: { cpu: '4', mem: '8589934592' },
    container_count: 1,
    created_at: '2024-03-01T09:00:00Z',
    terminated_at: null,
  },
  {
    session_id: 'sess-02',
    session_name: 'notebook',
    status: 'TERMINATED',
    status_info: 'user-requested',
    session_type: 'interactive',
    image: 'cuda:12.2',
    owner_email: 'bob@example.com',
    group_name: 'default',
    scaling_group: 'default',
    occupied_slots: {},
    container_count: 1,
    created_at: '2024-03-02T10:30:00Z',
    terminated_at: '2024-03-02T12:00:00Z',
  },
  {
    session_id: 'sess-03',
    session_name: 'eval',
    status: 'RUNNING',
    status_info: null,
    session_type: 'batch',
    image: 'pytorch:2.1',
    owner_email: 'alice@example.com',
    group_name: 'research',
    scaling_group: 'gpu',
    occupied_slots: { cpu: '2', mem: '4294967296', 'cuda.shares': '0.5' },
    container_count: 2,
    created_at: '2024-03-03T08:15:00Z',
    terminated_at: null,
  },
]

export const users = [
  {
    id: 'u-0001',
    username: 'alice',
    email: 'alice@example.com',
    full_name: 'Alice Example',
    role: 'admin',
    need_password_change: false,
    status: 'active',
    created_at: '2023-11-20T00:00:00Z',
    domain_name: 'default',
    groups: [{ id: 'g-1', name: 'default' }, { id: 'g-2', name: 'research' }],
    totp_activated: true,
  },
  {
    id: 'u-0002',
    username: 'bob',
    email: 'bob@example.com',
    full_name: 'Bob Example',
    role: 'user',
    need_password_change: true,
    status: 'inactive',
    created_at: '2024-01-15T12:00:00Z',
    domain_name: 'default',
    groups: [{ id: 'g-1', name: 'default' }],
    totp_activated: false,
  },
]

export const images = [
  {
    name: 'cuda:12.2',
    registry: 'cr.example.com',
    tag: '12.2',
    digest: 'sha256:1111',
    size_bytes: 1610612736,
    aliases: ['cuda', 'cu12'],
    labels: { 'ai.example.role': 'COMPUTE' },
    installed: true,
  },
  {
    name: 'pytorch:2.1',
    registry: 'cr.example.com',
    tag: '2.1',
    digest: 'sha256:2222',
    size_bytes: 'unknown',
    aliases: [],
    installed: false,
  },
]

export const scalingGroups = [
  { name: 'default', description: 'CPU nodes', is_active: true, created_at: '2023-01-01T00:00:00Z', driver: 'static', scheduler: 'fifo' },
  { name: 'gpu', description: null, is_active: false, created_at: '2023-06-01T00:00:00Z', driver: 'static', scheduler: 'drf' },
]

export const keypairPolicies = [
  { name: 'default', max_concurrent_sessions: 5, idle_timeout: 3600, max_vfolder_size: 10737418240, allowed_vfolder_hosts: ['local'] },
  { name: 'gpu-heavy', max_concurrent_sessions: 2, idle_timeout: 600, max_vfolder_size: 0, allowed_vfolder_hosts: ['local', 'nfs'] },
]

export const fixtureCollections: Record<string, InMemoryCollection> = {
  '/sessions': { records: sessions, idKey: 'session_id' },
  '/admin/users': { records: users, idKey: 'email' },
  '/images': { records: images, idKey: 'name' },
  '/admin/scaling-groups': { records: scalingGroups, idKey: 'name' },
  '/admin/resource-policies/keypair': { records: keypairPolicies, idKey: 'name' },
}

export function createFixtureTransport(
  options: Omit<InMemoryTransportOptions, 'collections'> = {}
): InMemoryTransport {
  return new InMemoryTransport({ serverInfo: modernServer, ...options, collections: fixtureCollections })
}
