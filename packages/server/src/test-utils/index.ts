export { FakeServerAdapter, type StartCall } from "./fake-adapter.js";
