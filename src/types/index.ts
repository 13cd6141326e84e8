/**
 * Core type definitions for the Proxmox VE client
 */

// Session Types
export interface TransportOptions {
  timeout: number;
  /**
   * Certificate validation for every request made with a session.
   * Off by default to work with the self-signed certificates Proxmox ships;
   * callers talking to a host with a trusted certificate should turn it on.
   */
  rejectUnauthorized: boolean;
}

export interface Session {
  readonly baseUri: string;
  readonly authHeader: string;
  readonly serverHost: string;
  readonly transport: Readonly<TransportOptions>;
}

// API Types
export interface ApiEnvelope<T> {
  data: T;
}

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface VersionInfo {
  version: string;
  release: string;
  repoid?: string;
}

/** Raw record as returned by GET /nodes */
export interface RawNode {
  id: string;
  node: string;
  status: string;
  [field: string]: unknown;
}

/** Raw record as returned by GET /nodes/{node}/storage */
export interface RawStorage {
  storage: string;
  content?: string;
  used_fraction?: number;
  avail?: number;
  [field: string]: unknown;
}

/** Raw record as returned by GET /nodes/{node}/qemu */
export interface RawVirtualMachine {
  vmid: number | string;
  name?: string;
  status?: string;
  [field: string]: unknown;
}

// Entity Types
export interface ProxmoxNode {
  id: string;
  status: string;
  name: string;
}

export interface Storage {
  name: string;
  contentTypes: string[];
  usedFraction: number;
  available: number;
}

export interface ContentItem {
  volid: string;
  format?: string;
  size?: number;
  content?: string;
  [field: string]: unknown;
}

export interface VirtualMachine {
  id: number;
  name: string;
  status: string;
  [field: string]: unknown;
}

export type VmFilter = string | number;

// Mutator Types
export const CONTENT_KINDS = ['iso', 'vztmpl', 'import'] as const;
export type ContentKind = typeof CONTENT_KINDS[number];

export const CPU_TYPES = ['x86-64-v2-AES'] as const;
export type CpuType = typeof CPU_TYPES[number];

export const OS_TYPES = ['l26'] as const;
export type OsType = typeof OS_TYPES[number];

export interface CreateVmParams {
  node: string;
  name: string;
  memoryGB: number;
  cpuType: string;
  sockets: number;
  cores: number;
  osType: string;
  storage: string;
  diskGB: number;
  isoRef: string;
}

export interface CreateVmRequest {
  vmid: number;
  name: string;
  memory: number;
  cpu: CpuType;
  sockets: number;
  cores: number;
  ostype: OsType;
  scsihw: string;
  scsi0: string;
  net0: string;
  ide2: string;
}

export interface VmActionResult {
  id: number;
  name: string;
  node: string;
  task: string;
}

export type VmCreationResult = VmActionResult;

export interface DownloadUrlRequest {
  content: ContentKind;
  filename: string;
  node: string;
  storage: string;
  url: string;
}

// Error Types
export type ErrorType =
  | 'authentication'
  | 'network'
  | 'resource_not_found'
  | 'validation';

export type ResourceKind = 'node' | 'storage' | 'content' | 'vm';

// Configuration Types
export interface ProxmoxConfig {
  host: string;
  tokenId: string;
  secret: string;
}

export interface ReportingOptions {
  verbose: boolean;
}

export interface ClientConfig {
  proxmox: ProxmoxConfig;
  transport: TransportOptions;
  reporting: ReportingOptions;
}
