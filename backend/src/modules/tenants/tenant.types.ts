/**
 * Tenant = the isolation boundary. Its id is the value carried by ScopeContext.
 * id is stable and never mutated after creation.
 */
export type Tenant = {
  id: number;
  name: string;
  description: string | null;
  isDeleted: boolean;
};

export type NewTenant = {
  name: string;
  description?: string | null;
};
