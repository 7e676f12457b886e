export * from "./alertmanager-configurer";
export * from "./config-dir-watcher";
export * from "./layers";
export * from "./remote-configuration";
export * from "./settings";
