// Type declarations for the parts of jstat this package calls

declare module 'jstat' {
  export interface jStat {
    normal: {
      pdf(x: number, mean: number, std: number): number;
    };
  }

  const jStat: jStat;
  export default jStat;
}
