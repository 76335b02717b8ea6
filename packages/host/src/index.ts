// Application
export { createHost } from './host.js';
export type { HostApp, HostOptions } from './host.js';
export { loadHostConfig } from './config.js';
export type { HostConfig } from './config.js';

// Bridge
export { HostBridge, ClientSession } from './bridge.js';
export type { BridgeOptions, BridgeState, BridgeStatus } from './bridge.js';
export { MainLoop } from './main-loop.js';
export type { TimerCallback } from './main-loop.js';
export { CommandQueue, PendingCommand } from './pending.js';
export { CommandTable, classifyError } from './dispatch.js';
export type { Handler, HandlerContext, RegisterOptions } from './dispatch.js';
export { defaultHandlers, HOST_NAME, HOST_VERSION } from './handlers.js';
export { HandlerError, notFound, invalidParams, fromFsError } from './errors.js';
export type { HandlerErrorKind } from './errors.js';

// Scene and geometry
export { Scene } from './scene.js';
export type { SceneObject, ObjectType, AddObjectOptions } from './scene.js';
export { createMesh, computeBounds, mergeMeshes, weldVertices, triangleCount } from './mesh.js';
export type { TriangleMesh, NamedMesh } from './mesh.js';
export { boxMesh, sphereMesh, cylinderMesh } from './primitives.js';
export type { Vec3, BoundingBox } from './vec3.js';
