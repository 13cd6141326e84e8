import {
  CPU_TYPES,
  CreateVmParams,
  CreateVmRequest,
  OS_TYPES,
  Session,
  VmActionResult,
  VmCreationResult
} from '../types';
import { IResourceAccessor, IVmLifecycleManager } from '../interfaces';
import { ApiTransport, apiPath } from '../clients/ApiTransport';
import { ResourceAccessor } from '../accessors/ResourceAccessor';
import { ResourceFilter } from '../utils/ResourceFilter';
import { assertOneOf } from '../utils/validation';
import { logger } from '../utils/logger';

/** Lowest VM id Proxmox accepts; used when a node has no VMs yet */
export const FIRST_VM_ID = 100;

export const DISK_CONTROLLER = 'virtio-scsi-single';
export const NETWORK_DEVICE = 'virtio,bridge=vmbr0';

const MB_PER_GB = 1024;

type VmAction = 'delete' | 'start' | 'shutdown';

/**
 * Creates, deletes, starts and stops QEMU virtual machines.
 *
 * All operations return once Proxmox has accepted the task; they never wait
 * for the VM to reach its target state.
 */
export class VmLifecycleManager implements IVmLifecycleManager {
  private readonly transport: ApiTransport;
  private readonly accessor: IResourceAccessor;

  constructor(
    session: Session,
    transport: ApiTransport = new ApiTransport(session),
    accessor: IResourceAccessor = new ResourceAccessor(session, transport)
  ) {
    this.transport = transport;
    this.accessor = accessor;
  }

  /**
   * Create a VM with one SCSI disk, one NIC on vmbr0 and the ISO as CD-ROM.
   *
   * Memory is sent in whole MB, so fractional GB values are rounded
   * (0.3 GB becomes 307 MB).
   *
   * The id is the node's highest existing id plus one. Reading and then
   * creating is not atomic: concurrent calls against the same node can pick
   * the same id, so callers must serialise creation themselves.
   */
  async createVm(params: CreateVmParams): Promise<VmCreationResult> {
    const cpu = assertOneOf('cpuType', params.cpuType, CPU_TYPES);
    const ostype = assertOneOf('osType', params.osType, OS_TYPES);

    const vmid = await this.nextVmId(params.node);

    const request: CreateVmRequest = {
      vmid,
      name: params.name,
      memory: Math.round(params.memoryGB * MB_PER_GB),
      cpu,
      sockets: params.sockets,
      cores: params.cores,
      ostype,
      scsihw: DISK_CONTROLLER,
      scsi0: `${params.storage}:${params.diskGB},discard=on`,
      net0: NETWORK_DEVICE,
      ide2: `${params.isoRef},media=cdrom`
    };

    logger.info('Creating VM', { host: this.transport.host, node: params.node, vmid, name: params.name });
    const task = await this.transport.post<string>(apiPath('nodes', params.node, 'qemu'), request);

    return { id: vmid, name: params.name, node: params.node, task };
  }

  async deleteVm(node: string, name: string): Promise<VmActionResult> {
    return this.runAction(node, name, 'delete');
  }

  async startVm(node: string, name: string): Promise<VmActionResult> {
    return this.runAction(node, name, 'start');
  }

  /**
   * Graceful ACPI shutdown, not a forced power-off
   */
  async stopVm(node: string, name: string): Promise<VmActionResult> {
    return this.runAction(node, name, 'shutdown');
  }

  /**
   * Next free id on a node: max(existing) + 1, or FIRST_VM_ID when empty
   */
  async nextVmId(node: string): Promise<number> {
    const vms = await this.accessor.listVms(node);
    const maxId = ResourceFilter.maxVmId(vms);
    return maxId === undefined ? FIRST_VM_ID : maxId + 1;
  }

  /**
   * Resolve the name and send the transition. A failed lookup throws before
   * anything is sent.
   */
  private async runAction(node: string, name: string, action: VmAction): Promise<VmActionResult> {
    const vm = await this.accessor.listVms(node, name);
    const endpoint = apiPath('nodes', node, 'qemu', vm.id);

    logger.info(`VM ${action} requested`, { host: this.transport.host, node, vmid: vm.id, name });

    const task = action === 'delete'
      ? await this.transport.delete<string>(endpoint)
      : await this.transport.post<string>(`${endpoint}${apiPath('status', action)}`);

    return { id: vm.id, name, node, task };
  }
}
