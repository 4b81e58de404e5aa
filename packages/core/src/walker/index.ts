export { walkTree, type TreeWalk, type WalkOptions } from "./walk.js";
