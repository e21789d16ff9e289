export { Stack } from "./shared/structs/stack";
