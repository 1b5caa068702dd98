export * as Signoff from "./signoff";
export * as Headers from "./headers";
export * as Git from "./git";
export * as FileLister from "./file_lister";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Logger from "./logger";
export * as Utils from "./utils";
