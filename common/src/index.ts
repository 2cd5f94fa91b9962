export * from "./core/Client";
export * from "./core/WeblogClient";
export * from "./types/Weblog";
export * from "./types/WeblogUrl";
export * from "./util/UrlUtils";
