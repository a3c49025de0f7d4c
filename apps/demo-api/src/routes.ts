import {CaptureStore, capturesKey, path, pathParams} from '@lattice/extract'
import {
  bodyBytes,
  createHandler,
  createResponse,
  noRouteMatched,
  type Dispatch,
  type Responder,
  type RouteHandler
} from '@lattice/http'

type Route =
  | {kind: 'endpoint'; method: string; pattern: RegExp; handler: RouteHandler}
  /** Matches a path prefix, then continues with the remainder against nested routes. */
  | {kind: 'mount'; prefix: RegExp; routes: Route[]}

const endpoint = (method: string, pattern: RegExp, handler: RouteHandler): Route => ({
  kind: 'endpoint',
  method,
  pattern,
  handler
})

const mount = (prefix: RegExp, routes: Route[]): Route => ({kind: 'mount', prefix, routes})

const capturesOf = (match: RegExpExecArray) => CaptureStore.from(Object.entries(match.groups ?? {}))

const showUser = createHandler({userId: pathParams(path.integer())}, ({userId}) => `user ${userId}`)

const showMembership = createHandler(
  {ids: pathParams(path.tuple([path.integer(), path.integer()]))},
  ({ids: [userId, teamId]}) => `user ${userId} in team ${teamId}`
)

const showRepository = createHandler(
  {repository: pathParams(path.record({owner: path.string(), name: path.string()}))},
  ({repository}) => `${repository.owner}/${repository.name}`
)

const showLabels = createHandler(
  {labels: pathParams(path.map(path.string()))},
  ({labels}): Responder =>
    createResponse({
      status: 200,
      headers: [{name: 'content-type', value: 'application/json'}],
      body: Buffer.from(JSON.stringify(labels), 'utf8')
    })
)

const listSorted = createHandler(
  {direction: pathParams(path.choice(['asc', 'desc']))},
  ({direction}) => `sorted ${direction === 'asc' ? 'ascending' : 'descending'}`
)

const storeNote = createHandler(
  {noteId: pathParams(path.uuid()), body: bodyBytes},
  ({noteId, body}): Responder => [201, `stored ${body.length} bytes for note ${noteId}`]
)

const showOrgRepository = createHandler(
  {target: pathParams(path.record({org: path.string(), name: path.string()}))},
  ({target}) => `org ${target.org} repo ${target.name}`
)

const actAs = createHandler({org: pathParams(path.string())}, ({org}) => `acting as ${org}`)

export const routes: Route[] = [
  endpoint('GET', /^\/users\/(?<user_id>[^/]+)$/u, showUser),
  endpoint('GET', /^\/users\/(?<user_id>[^/]+)\/teams\/(?<team_id>[^/]+)$/u, showMembership),
  endpoint('GET', /^\/repos\/(?<owner>[^/]+)\/(?<name>[^/]+)$/u, showRepository),
  endpoint('GET', /^\/labels\/(?<scope>[^/]+)\/(?<label>[^/]+)$/u, showLabels),
  endpoint('GET', /^\/items\/sorted\/(?<direction>[^/]+)$/u, listSorted),
  endpoint('PUT', /^\/notes\/(?<note_id>[^/]+)$/u, storeNote),
  mount(/^\/orgs\/(?<org>[^/]+)(?=\/)/u, [
    endpoint('GET', /^\/repos\/(?<name>[^/]+)$/u, showOrgRepository),
    endpoint('GET', /^\/as\/(?<org>[^/]+)$/u, actAs)
  ])
]

type ResolvedRoute = {handler: RouteHandler; captures: CaptureStore}

const resolveRoute = ({
  table,
  method,
  remainder
}: {
  table: Route[]
  method: string
  remainder: string
}): ResolvedRoute | undefined => {
  for (const route of table) {
    if (route.kind === 'endpoint') {
      const match = route.method === method ? route.pattern.exec(remainder) : null
      if (match) {
        return {handler: route.handler, captures: capturesOf(match)}
      }

      continue
    }

    const match = route.prefix.exec(remainder)
    if (!match) {
      continue
    }

    const nested = resolveRoute({table: route.routes, method, remainder: remainder.slice(match[0].length)})
    if (nested) {
      // Captures of the deeper router are merged last so they win on name collisions.
      return {handler: nested.handler, captures: capturesOf(match).merge(nested.captures)}
    }
  }

  return undefined
}

export const createDispatch =
  (table: Route[]): Dispatch =>
  async (request, extensions) => {
    const resolved = resolveRoute({table, method: request.method, remainder: request.path})
    if (!resolved) {
      return noRouteMatched(request)
    }

    extensions.require(capturesKey).merge(resolved.captures)
    return resolved.handler({request, extensions})
  }

export const dispatch = createDispatch(routes)
