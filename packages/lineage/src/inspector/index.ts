export { createInspector, Inspector } from "./inspector";
export {
  type InspectorHooks,
  type InspectorOptions,
  type ResolveHookContext,
} from "./types";
