export {
  layoutOf,
  type Layout,
  type LayoutMetadata,
  type LayoutOptions,
  type PortableType,
} from "./metadata.js";
export { pass } from "./pass.js";
