/** Third coordinate of a Right: the REST action being granted. */
export enum RestMethod {
  GET = 'GET',
  POST = 'POST',
  PUT = 'PUT',
  DELETE = 'DELETE'
}

const REST_METHODS: ReadonlySet<string> = new Set(Object.values(RestMethod));

export function isRestMethod(value: unknown): value is RestMethod {
  return typeof value === 'string' && REST_METHODS.has(value);
}

/** Maps an HTTP verb onto RestMethod; HEAD reads like GET, anything else has no mapping. */
export function toRestMethod(httpMethod: string): RestMethod | undefined {
  const upper = httpMethod.toUpperCase();
  if (upper === 'HEAD') return RestMethod.GET;
  return isRestMethod(upper) ? upper : undefined;
}
