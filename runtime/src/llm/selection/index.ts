export { selectModel, COST_THRESHOLD_PERCENT } from "./model-selector.js";
export type { SelectionCriteria, ModelSelection } from "./model-selector.js";
