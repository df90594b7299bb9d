export { Context, createContext } from "./context.ts";
