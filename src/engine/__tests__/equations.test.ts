import { describe, it, expect } from 'vitest';
import {
  absoluteHumidity,
  dryAirDensity,
  moistAirEnthalpy,
  pressureAtAltitudeKpa,
  saturatedVaporPressureMmHg,
} from '../equations/atmosphere';
import {
  combustionProducts,
  dulongHeatingValue,
  gasMixtureDensity,
  productHeatCapacity,
  theoreticalAirFuelRatio,
} from '../equations/combustion';
import {
  colebrookFrictionFactor,
  darcyPressureDropPerMeter,
  reynoldsNumber,
} from '../equations/flow';

const NO_PRODUCTS = { co2: 0, h2o: 0, so2: 0, o2: 0, n2: 0 };

describe('atmosphere equations', () => {
  it('returns standard sea-level pressure at 0 m', () => {
    expect(pressureAtAltitudeKpa(0)).toBeCloseTo(101.325, 6);
  });

  it('drops to ~73.37 kPa at 2640 m', () => {
    expect(pressureAtAltitudeKpa(2640)).toBeCloseTo(73.3728, 3);
  });

  it('uses isothermal decay above 11 000 m', () => {
    expect(pressureAtAltitudeKpa(12000)).toBeCloseTo(101.325 * Math.exp(-12000 / 8500), 8);
  });

  it('Antoine gives ~760 mmHg at 100°C', () => {
    expect(saturatedVaporPressureMmHg(100)).toBeCloseTo(760.09, 1);
  });

  it('absolute humidity is 0 for dry air', () => {
    expect(absoluteHumidity(0, 15, 73.37)).toBe(0);
  });

  it('moist-air enthalpy reduces to 1.006·T for dry air', () => {
    expect(moistAirEnthalpy(15, 0)).toBeCloseTo(15.09, 10);
  });

  it('dry-air density at 15°C and sea level is ~1.225 kg/m³', () => {
    expect(dryAirDensity(15, 101.325)).toBeCloseTo(1.22501, 4);
  });
});

describe('dulongHeatingValue', () => {
  it('uses the composition as-is when it already totals 100', () => {
    const r = dulongHeatingValue(50, 6, 40, 0, 4);
    expect(r.renormalized).toBe(false);
    expect(r.pcsKjKg).toBeCloseTo(18352.8, 6);
    expect(r.pciKjKg).toBeCloseTo(17034.12, 6);
    expect(r.waterFromCombustion).toBeCloseTo(54, 10);
  });

  it('rescales bagasse (C+H+O+S+ash = 99.79) and subtracts moisture latent heat', () => {
    const r = dulongHeatingValue(50.29, 5.82, 42.94, 0.08, 0.66, 35.09);
    expect(r.renormalized).toBe(true);
    expect(r.pcsKjKg).toBeCloseTo(17705.66, 1);
    expect(r.pciKjKg).toBeCloseTo(15566.95, 1);
    expect(r.pcsKjKg).toBeGreaterThan(r.pciKjKg);
  });
});

describe('stoichiometry', () => {
  it('pure carbon needs 2.667/0.232 kg air per kg', () => {
    expect(theoreticalAirFuelRatio(100, 0, 0, 0)).toBeCloseTo(11.4957, 4);
  });

  it('dry pure carbon at zero excess air gives 3.67 kg CO2 and no free O2', () => {
    const r = combustionProducts(100, 0, 0, 0, 0, 0, 0);
    expect(r.products.co2).toBeCloseTo(3.67, 10);
    expect(r.products.o2).toBe(0);
    expect(r.products.n2).toBeCloseTo(0.768 * r.theoreticalAirKgKg, 10);
  });

  it('bagasse products per kg of wet fuel', () => {
    const r = combustionProducts(50.29, 5.82, 42.94, 0.08, 35.09, 0.66, 30);
    expect(r.products.co2).toBeCloseTo(1.19801, 4);
    expect(r.products.h2o).toBeCloseTo(0.69090, 4);
    expect(r.products.so2).toBeCloseTo(0.0010386, 6);
    expect(r.products.o2).toBeCloseTo(0.240695, 5);
    expect(r.products.n2).toBeCloseTo(3.45273, 4);
    expect(r.totalGasKgKg).toBeCloseTo(
      r.products.co2 + r.products.h2o + r.products.so2 + r.products.o2 + r.products.n2,
      12,
    );
  });
});

describe('gas mixture properties', () => {
  it('pure N2 at 0°C and 1 atm is ~1.25 kg/m³', () => {
    expect(gasMixtureDensity(273.15, 101325, { ...NO_PRODUCTS, n2: 1 })).toBeCloseTo(1.24992, 4);
  });

  it('an empty mixture has zero density', () => {
    expect(gasMixtureDensity(500, 101325, NO_PRODUCTS)).toBe(0);
  });

  it('heat capacity sums m·Cp per species', () => {
    expect(productHeatCapacity({ ...NO_PRODUCTS, co2: 1, n2: 2 })).toBeCloseTo(0.844 + 2.08, 10);
  });
});

describe('flow equations', () => {
  it('Reynolds number uses μ = 1.8e-5 by default', () => {
    expect(reynoldsNumber(10, 1, 1)).toBeCloseTo(10 / 1.8e-5, 6);
  });

  it('Reynolds number rises strictly with velocity at fixed density and diameter', () => {
    const re = [0.5, 1, 5, 15, 25].map(v => reynoldsNumber(v, 0.762, 0.45));
    for (let i = 1; i < re.length; i++) {
      expect(re[i]).toBeGreaterThan(re[i - 1]);
    }
  });

  it('laminar below Re 2300', () => {
    expect(colebrookFrictionFactor(1000, 0.5)).toEqual({
      value: 0.064,
      iterations: 0,
      converged: true,
      regime: 'laminar',
    });
  });

  it('no flow gives a zero friction factor', () => {
    expect(colebrookFrictionFactor(0, 0.5).value).toBe(0);
  });

  it('is continuous at Re 2300', () => {
    const below = colebrookFrictionFactor(2299.999, 0.5);
    const at = colebrookFrictionFactor(2300, 0.5);
    expect(below.regime).toBe('laminar');
    expect(at.regime).toBe('transitional');
    expect(at.value).toBeCloseTo(below.value, 6);
  });

  it('turbulent result satisfies the Colebrook-White equation', () => {
    const D = 0.762;
    const re = 1e5;
    const r = colebrookFrictionFactor(re, D);
    expect(r.regime).toBe('turbulent');
    expect(r.converged).toBe(true);
    const lhs = 1 / Math.sqrt(r.value);
    const rhs = -2 * Math.log10(0.00015 / (3.7 * D) + 2.51 / (re * Math.sqrt(r.value)));
    expect(lhs).toBeCloseTo(rhs, 3);
  });

  it('Darcy-Weisbach drop per metre', () => {
    expect(darcyPressureDropPerMeter(0.02, 1, 10, 0.5)).toBeCloseTo(2, 10);
  });
});
