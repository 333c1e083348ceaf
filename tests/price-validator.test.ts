import { expect } from 'chai';
import { PriceValidator } from '../app/src/controller/price-validator';
import { ConfigurationError } from '../app/src/types';
import { e18 } from './helpers/fakes';

describe('PriceValidator', () => {
  it('accepts everything positive while the gate is disabled', () => {
    const validator = new PriceValidator();
    validator.recordPrice(e18(100), 0);
    expect(validator.validate(e18(1000), 10_000)).to.deep.equal({ valid: true });
    expect(validator.getConfig()).to.deep.equal({ maxDeviationBps: 0, gracePeriodSeconds: 3600 });
  });

  it('rejects non-positive prices without tripping', () => {
    const validator = new PriceValidator({ maxDeviationBps: 500 });
    expect(validator.validate(0n, 0)).to.deep.equal({ valid: false, reason: 'Non-positive price 0' });
    expect(validator.isTripped()).to.equal(false);
  });

  it('ignores deviation during the grace period', () => {
    const validator = new PriceValidator({ maxDeviationBps: 500, gracePeriodSeconds: 100 });
    validator.recordPrice(e18(100), 1000);
    expect(validator.inGracePeriod(1099)).to.equal(true);
    expect(validator.validate(e18(200), 1099)).to.deep.equal({ valid: true });
    expect(validator.inGracePeriod(1100)).to.equal(false);
  });

  it('is in the grace period until a first price is accepted', () => {
    const validator = new PriceValidator({ maxDeviationBps: 500, gracePeriodSeconds: 0 });
    expect(validator.inGracePeriod(5)).to.equal(true);
  });

  it('trips on a move beyond the limit and stays tripped', () => {
    const validator = new PriceValidator({ maxDeviationBps: 500, gracePeriodSeconds: 0 });
    validator.recordPrice(e18(100), 1000);

    expect(validator.validate(e18(105), 1001)).to.deep.equal({ valid: true });
    expect(validator.validate(e18(106), 1001)).to.deep.equal({
      valid: false,
      reason: 'Price moved 600 bps, limit 500 bps',
      tripped: true,
    });
    expect(validator.validate(e18(100), 1002)).to.deep.equal({
      valid: false,
      reason: 'Circuit breaker active',
      tripped: true,
    });
  });

  it('takes the next price as the reference after a reset', () => {
    const validator = new PriceValidator({ maxDeviationBps: 500, gracePeriodSeconds: 0 });
    validator.recordPrice(e18(100), 1000);
    validator.validate(e18(200), 1001);
    validator.reset();

    expect(validator.isTripped()).to.equal(false);
    expect(validator.getLastPrice()).to.equal(null);
    expect(validator.validate(e18(200), 1002)).to.deep.equal({ valid: true });
  });

  it('keeps unspecified settings when reconfigured', () => {
    const validator = new PriceValidator({ maxDeviationBps: 250, gracePeriodSeconds: 60 });
    validator.configure({ maxDeviationBps: 100 });
    expect(validator.getConfig()).to.deep.equal({ maxDeviationBps: 100, gracePeriodSeconds: 60 });
    expect(() => validator.configure({ gracePeriodSeconds: -1 })).to.throw(ConfigurationError);
  });
});
