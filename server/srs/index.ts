export { applyReview, intervalFor, transition } from "./engine.js";
