export {
  type AncestorHandler,
  createHandlerTable,
  HandlerTable,
  type HandlerTableOptions,
} from "./handler-table";
export { type AncestorCallback, forEachAncestor } from "./iterator";
