export { LoggingActuationSink, CompositeActuationSink } from './actuation-sink';
export type { ActuationSink } from './actuation-sink';
export { MqttActuationSink } from './mqtt-sink';
export type { MqttPublisher } from './mqtt-sink';
