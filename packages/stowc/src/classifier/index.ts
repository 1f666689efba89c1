export {
  Classifier,
  infiniteLayout,
  labelledFields,
  type ReferenceClassifier,
} from "./classifier.js";
export { Packedness } from "#types";
