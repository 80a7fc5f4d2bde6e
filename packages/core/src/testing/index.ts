export { expectAudit } from './expect.js';
export { FakeBridge, type FakeHandler } from './fakeBridge.js';
export { ScriptedEngine, type ScriptedEngineOptions, type StructuredCall } from './fakeEngine.js';
export {
  InProcessBackend,
  InProcessChannel,
  type BackendReply,
  type BackendTool,
  type InProcessBackendOptions,
  type ReceivedMessage,
} from './inProcessBackend.js';
export { sampleAuditRecord } from './records.js';
