import type {
    Device,
    DeviceOfKind,
    PatternClientDevice,
    ResourceHandle,
    ResourceKind,
} from '@/types/devices';
import { ConfigurationError } from '@/utils/schedulingErrors';

/**
 * Devices participating in one experiment run, plus the pattern clients
 * currently attached to each executor group.
 *
 * Passed explicitly to the oracle and planner; a new registry per run.
 */
export class DeviceRegistry {
    private readonly devices = new Map<string, Device>();

    private readonly analogGroups = new Map<string, string[]>();

    constructor(devices: Iterable<Device> = []) {
        for (const device of devices) {
            this.register(device);
        }
    }

    public register(device: Device): void {
        const { id } = device.handle;
        if (this.devices.has(id)) {
            throw new ConfigurationError('duplicate_resource', `Device ${id} is already registered`, {
                resourceId: id,
            });
        }
        this.devices.set(id, device);
    }

    public has(id: string): boolean {
        return this.devices.has(id);
    }

    public get(handle: ResourceHandle): Device {
        const device = this.devices.get(handle.id);
        if (!device) {
            throw new ConfigurationError('unknown_resource', `Unknown resource ${handle.id}`, {
                resourceId: handle.id,
            });
        }
        return device;
    }

    /**
     * Look up a device by id and check it is of the expected kind.
     */
    public require<K extends ResourceKind>(id: string, kind: K): DeviceOfKind<K> {
        const device = this.devices.get(id);
        if (!device) {
            throw new ConfigurationError('unknown_resource', `Unknown resource ${id}`, {
                resourceId: id,
            });
        }
        if (!isDeviceOfKind(device, kind)) {
            throw new ConfigurationError(
                'wrong_resource_kind',
                `Resource ${id} is a ${device.kind}, expected ${kind}`,
                { resourceId: id },
            );
        }
        return device;
    }

    public list(): Device[] {
        return Array.from(this.devices.values());
    }

    public attachAnalogClient(group: string, clientId: string): void {
        this.require(clientId, 'pattern-client');
        const members = this.analogGroups.get(group) ?? [];
        if (!members.includes(clientId)) {
            this.analogGroups.set(group, [...members, clientId]);
        }
    }

    public detachAnalogClient(group: string, clientId: string): void {
        const members = this.analogGroups.get(group);
        if (!members) {
            return;
        }
        const remaining = members.filter((id) => id !== clientId);
        if (remaining.length > 0) {
            this.analogGroups.set(group, remaining);
        } else {
            this.analogGroups.delete(group);
        }
    }

    /**
     * Clients attached to a group right now, in attachment order.
     * Unknown groups have no clients.
     */
    public analogClients(group: string): PatternClientDevice[] {
        const members = this.analogGroups.get(group) ?? [];
        return members.map((id) => this.require(id, 'pattern-client'));
    }

    public groups(): string[] {
        return Array.from(this.analogGroups.keys());
    }
}

const isDeviceOfKind = <K extends ResourceKind>(
    device: Device,
    kind: K,
): device is DeviceOfKind<K> => device.kind === kind;
