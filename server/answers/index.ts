export { PASS_THRESHOLD, evaluate, expandCandidates, type AnswerCandidate } from "./evaluator.js";
export { levenshteinDistance, similarity } from "./similarity.js";
