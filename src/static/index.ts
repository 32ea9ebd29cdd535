export { noopStaticLinker, SymlinkStaticLinker, type StaticAssetLinker } from "./linker.js";
