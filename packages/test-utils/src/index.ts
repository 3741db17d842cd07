export { ScriptedTransport } from './scripted-transport.js';
export type { SendHook } from './scripted-transport.js';
export { AgentFailure, createCallInfo, createFakeDeviceAgent } from './fake-device-agent.js';
export type { FakeDeviceAgentOptions } from './fake-device-agent.js';
export {
  createMockDeviceEvent,
  createMockDeviceInfo,
  createMockFileEntry,
  createMockLogger,
  createMockPortMapping,
  jsonResponse,
  textResponse,
} from './mock-factories.js';
export { createFetchStub } from './fetch-stub.js';
export type { FetchRoute, FetchStub, RecordedRequest } from './fetch-stub.js';
