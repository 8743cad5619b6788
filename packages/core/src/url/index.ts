export { computeUrl } from "./compute.js";
