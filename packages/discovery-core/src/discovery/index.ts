export { TreeDiscovery } from './tree-discovery';
export { DiscoveryState } from './discovery-state';
export { ActivityLog } from './activity-log';
export type {
    DiscoveryReport,
    DiscoveryObserver,
    TreeDiscoveryOptions,
    DiscoverOptions,
} from './types';
