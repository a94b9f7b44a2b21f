export type { ControlSystem } from "./control-system.js";
export type {
	Device,
	Enabled,
	PvDeviceOptions,
	SimpleDeviceOptions,
} from "./device.js";
export { PvDevice, PvEnabler, SimpleDevice } from "./device.js";
export type { DeviceEntry } from "./device-table.js";
export { DeviceTable } from "./device-table.js";
export type { DataSourceErrorCode } from "./errors.js";
export { DataSourceError } from "./errors.js";
export type {
	FieldAccessorOptions,
	GetValueOptions,
	SetValueOptions,
	WriteResult,
} from "./field-accessor.js";
export { FieldAccessor } from "./field-accessor.js";
