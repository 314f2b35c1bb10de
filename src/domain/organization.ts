/**
 * Organization domain model.
 */

export enum OrganizationType {
  Standard = 'standard',
  Enterprise = 'enterprise',
}

export interface Organization {
  id: string;
  name: string;
  type: OrganizationType;
  created_at: string;
  updated_at: string;
}

export interface OrganizationListResponse {
  organizations: Organization[];
  /** Pagination cursor. The mock never has a second page. */
  next_page: string | null;
}

export function mockOrganizations(): Organization[] {
  return [
    {
      id: 'org_1',
      name: 'Mock Organization',
      type: OrganizationType.Standard,
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
    },
    {
      id: 'org_2',
      name: 'Mock Enterprise',
      type: OrganizationType.Enterprise,
      created_at: '2024-02-01T00:00:00.000Z',
      updated_at: '2024-03-01T00:00:00.000Z',
    },
  ];
}
