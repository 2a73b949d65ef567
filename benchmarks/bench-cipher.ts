import { Buffer } from "node:buffer";
import { type CipherStrategy, maskInto } from "../src/packet/cipher.js";

const STRATEGIES: CipherStrategy[] = ["scalar", "lane32", "block64"];

const runBenchmark = () => {
  const size = 10 * 1024 * 1024; // 10MB
  const src = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    src[i] = (i * 131) & 0xff;
  }
  const dst = Buffer.alloc(size);

  console.log("Running benchmark...");

  const iterations = 20;
  const reference = Buffer.alloc(size);
  maskInto(src, reference, { strategy: "scalar" });

  for (const strategy of STRATEGIES) {
    const start = performance.now();
    for (let i = 0; i < iterations; i++) {
      maskInto(src, dst, { strategy });
    }
    const elapsed = performance.now() - start;
    const throughput = (size * iterations) / (elapsed / 1000) / (1024 * 1024);
    console.log(`${strategy.padEnd(8)} ${elapsed.toFixed(2)}ms (${throughput.toFixed(0)} MB/s)`);

    if (!dst.equals(reference)) {
      console.error(`MISMATCH: ${strategy} differs from scalar output`);
      process.exitCode = 1;
    }
  }
};

runBenchmark();
