export { verifyBusinessLogic, matchFunctions, missingElements } from "./business-logic";
export { verifyErrorHandling } from "./error-handling";
export { verifyInputValidation } from "./input-validation";
