export const LIVE_SESSION_TYPES = {
  LiveSessionRepository: Symbol.for("LiveSessionRepository"),
  LiveSessionCommandService: Symbol.for("LiveSessionCommandService"),
  LiveSessionQueryService: Symbol.for("LiveSessionQueryService"),
  SessionCoordinator: Symbol.for("SessionCoordinator"),
  SessionRelayService: Symbol.for("SessionRelayService"),
  SessionGateway: Symbol.for("SessionGateway"),
  LiveSessionSettings: Symbol.for("LiveSessionSettings"),
} as const;
