/** A class of protected objects, e.g. every group. */
export interface Resource {
  readonly kind: 'resource';
  readonly name: string;
}

/** One concrete instance of a resource, e.g. the group with id 42. */
export interface SpecificResource {
  readonly kind: 'specific';
  readonly name: string;
  readonly instanceId: string;
}

export type AnyResource = Resource | SpecificResource;

export function resource(name: string): Resource {
  return { kind: 'resource', name };
}

export function specificResource(name: string, instanceId: string): SpecificResource {
  return { kind: 'specific', name, instanceId };
}

export function resourceEquals(a: AnyResource, b: AnyResource): boolean {
  if (a.kind === 'resource' && b.kind === 'resource') return a.name === b.name;
  if (a.kind === 'specific' && b.kind === 'specific') return a.name === b.name && a.instanceId === b.instanceId;
  return false;
}

export function instanceIdOf(r: AnyResource): string | null {
  return r.kind === 'specific' ? r.instanceId : null;
}

/** `groups` or `groups/42` */
export function describeResource(r: AnyResource): string {
  return r.kind === 'specific' ? `${r.name}/${r.instanceId}` : r.name;
}
