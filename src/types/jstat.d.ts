// Type declarations for the parts of jstat used as a reference in tests

declare module 'jstat' {
  export interface jStat {
    normal: {
      cdf(x: number, mean: number, std: number): number;
    };

    studentt: {
      cdf(x: number, dof: number): number;
    };

    chisquare: {
      cdf(x: number, dof: number): number;
    };

    centralF: {
      cdf(x: number, df1: number, df2: number): number;
    };

    noncentralt: {
      cdf(x: number, dof: number, ncp: number): number;
    };

    gammaln(x: number): number;
    // Regularized lower incomplete gamma P(a, x)
    lowRegGamma(a: number, x: number): number;
    ibeta(x: number, a: number, b: number): number;
  }

  const jStat: jStat;
  export default jStat;
}
