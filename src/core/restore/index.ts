export { type Extractor, RestoreEngine } from "./engine";
