export * from './types';
export * from './errors';
export * from './interfaces';
export { ApiTransport } from './clients/ApiTransport';
export { ProxmoxConnector, createSession, DEFAULT_TRANSPORT_OPTIONS } from './clients/ProxmoxConnector';
export { ProxmoxClient } from './clients/ProxmoxClient';
export { ResourceAccessor } from './accessors/ResourceAccessor';
export { ContentUploader } from './managers/ContentUploader';
export { VmLifecycleManager, FIRST_VM_ID } from './managers/VmLifecycleManager';
export { logger, setLogLevel } from './utils/logger';
