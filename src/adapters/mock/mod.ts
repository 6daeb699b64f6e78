/**
 * Mock transport exports for testing
 */

export {
	createMockTransport,
	type MockHandler,
	type MockRequest,
	type MockRoute,
	type MockTransport,
	type MockTransportOptions,
} from "./transport.ts";
