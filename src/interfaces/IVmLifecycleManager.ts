import { CreateVmParams, VmActionResult, VmCreationResult } from '../types';

/**
 * Interface for triggering VM state transitions
 */
export interface IVmLifecycleManager {
  createVm(params: CreateVmParams): Promise<VmCreationResult>;
  deleteVm(node: string, name: string): Promise<VmActionResult>;
  startVm(node: string, name: string): Promise<VmActionResult>;
  stopVm(node: string, name: string): Promise<VmActionResult>;
}
