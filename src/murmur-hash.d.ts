declare module 'murmur-hash' {
  const murmurHash: {
    v3: {
      x86: {
        hash32(key: string, seed?: number): number;
      };
    };
  };
  export = murmurHash;
}
