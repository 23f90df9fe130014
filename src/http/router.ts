import type { HttpRequest, HttpResponse } from './parser.js'

export type RouteParams = Record<string, string>
export type RouteHandler = (req: HttpRequest, params: RouteParams) => HttpResponse | Promise<HttpResponse>

interface Route {
  method: string
  segments: string[]  // e.g. ['api', 'localsend', 'v2', 'upload']
  handler: RouteHandler
}

export type RouteMatch =
  | { handler: RouteHandler; params: RouteParams }
  | { methodNotAllowed: true; allow: string[] }

export class Router {
  private routes: Route[] = []

  add(method: string, pattern: string, handler: RouteHandler): void {
    this.routes.push({
      method: method.toUpperCase(),
      segments: pattern.split('/').filter(Boolean),
      handler
    })
  }

  /** Null when no route has this path; a 405 marker when only the method is wrong. */
  match(method: string, path: string): RouteMatch | null {
    const pathSegments = path.split('/').filter(Boolean)
    const upperMethod = method.toUpperCase()
    const allow: string[] = []

    for (const route of this.routes) {
      const params = matchRoute(route, pathSegments)
      if (params === null) continue
      if (route.method === upperMethod) return { handler: route.handler, params }
      allow.push(route.method)
    }

    return allow.length > 0 ? { methodNotAllowed: true, allow } : null
  }
}

function matchRoute(route: Route, pathSegments: string[]): RouteParams | null {
  if (pathSegments.length !== route.segments.length) return null

  const params: RouteParams = {}

  for (let i = 0; i < route.segments.length; i++) {
    const routeSeg = route.segments[i] ?? ''
    const pathSeg = pathSegments[i] ?? ''

    if (routeSeg.startsWith(':')) {
      try {
        params[routeSeg.slice(1)] = decodeURIComponent(pathSeg)
      } catch {
        return null
      }
    } else if (routeSeg !== pathSeg) {
      return null
    }
  }

  return params
}
