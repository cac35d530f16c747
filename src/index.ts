export * from "./errors";
export * from "./types";
export * from "./interfaces";

export * from "./implementations/builders/cloud-event-builder";
export * from "./implementations/event/cloud-event";
export * from "./implementations/attributes/attributes-v1";
export * from "./implementations/attributes/attributes-v03";
export * from "./implementations/extensions/distributed-tracing";
export { visitExtension } from "./implementations/extensions/visit-extension";
export * from "./implementations/message/event-messages";
export * from "./implementations/message/generic-messages";
export * from "./implementations/message/headers-binary-message";
export { readStructuredEvent } from "./implementations/message/structured-reader";
export { messageToEvent, eventFromStructured } from "./implementations/message/to-event";
export * from "./implementations/formats/json-format";
export * from "./implementations/formats/format-registry";
export * from "./implementations/headers/headers-codec";
export * from "./implementations/rabbitmq/amqp-codec";
export * from "./implementations/rabbitmq/rabbitmq-event-bus";
export { validateAndMergeOptions } from "./implementations/utils/bus-options-validator";
export * from "./utils/event-factory";
