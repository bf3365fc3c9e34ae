export { checkStandards } from "./consistency";
