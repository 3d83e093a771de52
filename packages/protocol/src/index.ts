export type * from "./messages.js";
export type * from "./commands.js";
export type * from "./events.js";
export type * from "./channel.js";
export type * from "./business.js";
export type * from "./user.js";
export type * from "./database.js";
