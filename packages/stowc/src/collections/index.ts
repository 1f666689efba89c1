export { checkCollection, type Classify } from "./checker.js";
