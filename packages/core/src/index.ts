export type { CalibrationCurve } from "./calibration/curve.js";
export {
	createCalibrationCurve,
	linearGradient,
	responseRatios,
} from "./calibration/curve.js";
export type { CalibrationSamples } from "./calibration/table.js";
export { CalibrationTable, isUniformResponse } from "./calibration/table.js";
export type {
	ConversionKind,
	ConversionLimits,
	ConversionOptions,
	ConversionParams,
} from "./conversion/record.js";
export {
	ConversionRecord,
	linearConversion,
	NULL_CONVERSION,
} from "./conversion/record.js";
export {
	ELECTRON_MASS_MEV,
	magneticRigidity,
	SPEED_OF_LIGHT,
} from "./conversion/rigidity.js";
export {
	findClosestMatches,
	levenshteinDistance,
	normalizeName,
} from "./definition/fuzzy-match.js";
export type {
	LatticeDefinition,
	LatticeDefinitionStub,
	LatticeElement,
	PvDeviceDefinition,
	SimpleDeviceDefinition,
} from "./definition/lattice.js";
export {
	allFamilies,
	familyMembers,
	latticeEnergy,
	registryOptionsFor,
	sPositions,
} from "./definition/lattice.js";
export type { LatticeDataProvider } from "./definition/provider.js";
export type {
	ConversionErrorCode,
	RegistryBuildErrorCode,
	RowLocation,
} from "./errors.js";
export { ConversionError, RegistryBuildError } from "./errors.js";
export type {
	ConversionStrategy,
	ElementKind,
	ElementKindInfo,
} from "./lattice/element-kind.js";
export {
	CORRECTOR_KINDS,
	ELEMENT_KINDS,
	isElementKind,
	needsRigidity,
	RIGIDITY_FAMILIES,
} from "./lattice/element-kind.js";
export type { WindingRule } from "./lattice/index-map.js";
export { IndexMap } from "./lattice/index-map.js";
export type {
	DeviceDescription,
	UnitTableInput,
	WindingOffset,
} from "./lattice/unit-tables.js";
export { buildUnitTables } from "./lattice/unit-tables.js";
export type { ClampConstraints } from "./math/operations.js";
export { clamp } from "./math/operations.js";
export type { PchipInterpolant } from "./math/pchip.js";
export { createPchip, evaluatePchip, pchipSlopes } from "./math/pchip.js";
export { effectiveDegree, evaluatePolynomial } from "./math/polynomial.js";
export type { RegistryEntry, RegistryOptions } from "./registry/registry.js";
export {
	buildConversionRegistry,
	ConversionRegistry,
} from "./registry/registry.js";
export type {
	PchipDataRow,
	PolyDataRow,
	UnitsRow,
	UnitTables,
} from "./registry/rows.js";
export type { FieldValue, Handle, UnitSystem } from "./units.js";
export {
	ENGINEERING,
	isHandle,
	isUnitSystem,
	mapValue,
	PHYSICS,
	READBACK,
	SETPOINT,
} from "./units.js";
export {
	validateIncreasingSequence,
	validateLimits,
	validateMonotonicIncreasing,
	validateNumber,
} from "./validation/rules.js";
export type {
	SequenceValidationOptions,
	ValidationContext,
	ValidationErrorCode,
	ValidationResult,
} from "./validation/types.js";
