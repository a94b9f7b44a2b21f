/** Electron rest energy in MeV (CODATA 2018) */
export const ELECTRON_MASS_MEV = 0.51099895;

/** Speed of light in vacuum, m/s */
export const SPEED_OF_LIGHT = 299_792_458;

/**
 * Magnetic rigidity Bρ (T·m) of an electron beam: p / e = β·E / c.
 *
 * @throws Error if the energy is below the electron rest energy
 *
 * @example
 * magneticRigidity(3000); // ≈ 10.0069
 */
export function magneticRigidity(energyMeV: number): number {
	if (!Number.isFinite(energyMeV) || energyMeV <= ELECTRON_MASS_MEV) {
		throw new Error(
			`Beam energy ${energyMeV} MeV must exceed the electron rest energy (${ELECTRON_MASS_MEV} MeV)`,
		);
	}
	const gamma = energyMeV / ELECTRON_MASS_MEV;
	const beta = Math.sqrt(1 - gamma ** -2);
	return (beta * energyMeV * 1e6) / SPEED_OF_LIGHT;
}
