export { assertConcreteFields, assertRelaxedConstraints } from "./assertions.js";
export {
	createRecordingLogger,
	getTestInstance,
	type LogEntry,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
