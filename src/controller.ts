export { TrialController, type TrialControllerDeps } from "./controller/trialController.js";
export { NodeFlashTimer } from "./controller/timer.js";
export { parseRankingRequest, type ParsedRankingRequest } from "./controller/request.js";
