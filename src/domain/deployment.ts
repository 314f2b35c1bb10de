/**
 * Deployment domain model.
 *
 * A deployment groups the resources (Elasticsearch, Kibana, ...) that run
 * together in one region.
 */

export enum DeploymentStatus {
  Running = 'running',
  Stopped = 'stopped',
}

export interface Resource {
  id: string;
  /** Resource kind, e.g. "elasticsearch". */
  kind: string;
  region: string;
  refId: string;
}

export interface Deployment {
  id: string;
  name: string;
  region: string;
  status: DeploymentStatus;
  resources: Resource[];
}

export interface DeploymentListResponse {
  deployments: Deployment[];
}

export interface CreateDeploymentResponse {
  id: string;
  name: string;
  alias: string | null;
  created: true;
  resources: Resource[];
}

/** Resource kinds reported in a search result's per-kind breakdown. */
export const RESOURCE_KINDS = [
  'elasticsearch',
  'kibana',
  'apm',
  'integrations_server',
  'enterprise_search',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface DeploymentSearchHit {
  id: string;
  name: string;
  healthy: boolean;
  resources: Record<ResourceKind, Resource[]>;
}

export interface DeploymentSearchResponse {
  returnCount: number;
  matchCount: number;
  deployments: DeploymentSearchHit[];
}

export function mockDeployments(): Deployment[] {
  return [
    {
      id: 'dep_1',
      name: 'Mock Deployment 1',
      region: 'us-east-1',
      status: DeploymentStatus.Running,
      resources: [],
    },
    {
      id: 'dep_2',
      name: 'Mock Deployment 2',
      region: 'eu-west-1',
      status: DeploymentStatus.Stopped,
      resources: [],
    },
  ];
}

/** The single resource attached to every newly created deployment. */
export function mockElasticsearchResource(): Resource {
  return {
    id: 'res_123',
    kind: 'elasticsearch',
    region: 'us-east-1',
    refId: 'main-elasticsearch',
  };
}

export function emptyResourceBreakdown(): Record<ResourceKind, Resource[]> {
  return {
    elasticsearch: [],
    kibana: [],
    apm: [],
    integrations_server: [],
    enterprise_search: [],
  };
}
