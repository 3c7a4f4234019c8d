export { ChannelManager } from "./manager.js";
export type { ChannelManagerDeps } from "./manager.js";
export { MockChannelPlugin } from "./mock-plugin.js";
export { DeliveryGateway } from "./delivery-gateway.js";
