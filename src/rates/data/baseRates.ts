/**
 * @file Base Exchange Rates
 * USD-based reference table served (with jitter) by the rates stub.
 */

export const BASE_CURRENCY: string = 'USD';

export const BASE_RATES: Readonly<Record<string, number>> = {
    AED: 3.673,
    AUD: 1.532,
    CAD: 1.393,
    CHF: 0.884,
    CNY: 7.245,
    EUR: 0.925,
    GBP: 0.790,
    HKD: 7.773,
    INR: 83.42,
    JPY: 149.83,
    KRW: 1383.50,
    MXN: 17.08,
    NOK: 10.89,
    NZD: 1.677,
    RUB: 92.50,
    SEK: 10.76,
    SGD: 1.344,
    TRY: 34.15,
    USD: 1.0,
    ZAR: 18.23,
};
