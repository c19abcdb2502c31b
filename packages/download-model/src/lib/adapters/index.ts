export { createNodeFetchTransport, nodeFetchTransport } from "./node-fetch-transport.js";
