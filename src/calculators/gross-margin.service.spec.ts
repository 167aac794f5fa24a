import { Test } from '@nestjs/testing';
import { GrossMarginService } from './gross-margin.service';

describe('GrossMarginService', () => {
  let service: GrossMarginService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [GrossMarginService],
    }).compile();

    service = moduleRef.get(GrossMarginService);
  });

  it('computes margin and monthly profit', () => {
    expect(service.calculate({ costPerUnit: 1, pricePerUnit: 3, unitsPerCustomer: 100, customers: 10 })).toEqual({
      grossMargin: 66.7,
      monthlyProfitPerCustomer: 200,
      monthlyTotalProfit: 2000,
      band: 'strong',
      benchmarks: { saas: 80, aiAverage: 55 },
    });
  });

  it.each([
    [2, 4, 50, 'typical'],
    [3, 4, 25, 'weak'],
    [1, 0, 0, 'weak'],
  ])('cost %p at price %p -> %p%% (%s)', (cost, price, margin, band) => {
    const result = service.calculate({ costPerUnit: cost, pricePerUnit: price, unitsPerCustomer: 1, customers: 1 });
    expect(result.grossMargin).toBe(margin);
    expect(result.band).toBe(band);
  });
});
