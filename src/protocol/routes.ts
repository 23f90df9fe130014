export type ApiRoute = 'prepare-upload' | 'upload' | 'cancel'

export const API_PREFIX = '/api/localsend/v2'

export function routePath(route: ApiRoute): string {
  return `${API_PREFIX}/${route}`
}

export interface RouteTarget {
  address: string
  port: number
  https: boolean
}

export function routeUrl(route: ApiRoute, target: RouteTarget, query: Record<string, string> = {}): string {
  const protocol = target.https ? 'https' : 'http'
  const host = target.address.includes(':') ? `[${target.address}]` : target.address
  const qs = new URLSearchParams(query).toString()
  return `${protocol}://${host}:${target.port}${routePath(route)}${qs ? `?${qs}` : ''}`
}
