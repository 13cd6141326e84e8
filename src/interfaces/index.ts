export * from './IProxmoxConnector';
export * from './IResourceAccessor';
export * from './IContentUploader';
export * from './IVmLifecycleManager';
