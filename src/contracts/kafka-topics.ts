export const KAFKA_TOPICS = {
  commandRequests: 'csms.command.requests',
  commandEvents: 'ocpp.command.events',
  stationEvents: 'ocpp.station.events',
  sessionEvents: 'ocpp.session.events',
} as const
