import {
  type ChainedCommitmentProof,
  type ChainVerifier,
  type CommitmentPath,
  type CommitmentRoot,
  createChainVerifier,
  pathToString,
  type VerifyResult,
} from "@chainproof/commitment";
import type { Command } from "commander";
import { isValueEncoding, loadConfig } from "../lib/config.ts";
import { CliFailure } from "../lib/errors.ts";
import {
  buildPath,
  decodeValue,
  parseRoot,
  readProofFile,
  resolvePrefix,
} from "../lib/input.ts";
import { createFormatter, type OutputFormatter } from "../lib/output.ts";

type VerifyOptions = {
  proof: string;
  root: string;
  prefix?: string | false;
};

type MembershipOptions = VerifyOptions & {
  value: string;
  valueEncoding?: string;
};

type VerifyKind = "membership" | "non-membership";

type VerifyInputs = {
  verifier: ChainVerifier;
  proof: ChainedCommitmentProof;
  root: CommitmentRoot;
  path: CommitmentPath;
};

function loadInputs(
  formatter: OutputFormatter,
  segments: string[],
  cmdOpts: VerifyOptions
): VerifyInputs {
  const config = loadConfig();

  const proof = readProofFile(cmdOpts.proof);
  if (!proof.ok) {
    formatter.error(`${proof.code}: ${proof.message}`);
    throw new CliFailure();
  }

  const path = buildPath(segments, resolvePrefix(cmdOpts.prefix, config.defaultPrefix));
  if (!path.ok) {
    formatter.error(`${path.code}: ${path.message}`);
    throw new CliFailure();
  }

  formatter.debug(`Proof: ${cmdOpts.proof} (${proof.value.proofs.length} sub-proofs)`);
  formatter.debug(`Path: ${pathToString(path.value)}`);

  const verifier = createChainVerifier({
    maxChainLength: config.maxChainLength,
    logger: {
      debug: (message) => formatter.debug(message),
      warn: (message) => formatter.debug(message),
    },
  });

  return { verifier, proof: proof.value, root: parseRoot(cmdOpts.root), path: path.value };
}

function report(
  formatter: OutputFormatter,
  kind: VerifyKind,
  path: CommitmentPath,
  result: VerifyResult
): void {
  const rendered = pathToString(path);

  if (!result.ok) {
    if (formatter.format !== "text") {
      formatter.output({ kind, path: rendered, verified: false, code: result.code });
    }
    formatter.error(`${result.code}: ${result.message}`);
    throw new CliFailure();
  }

  if (formatter.format === "text") {
    formatter.success(`${kind} verified for ${rendered}`);
  } else {
    formatter.output({ kind, path: rendered, verified: true });
  }
}

export function registerVerifyCommands(program: Command): void {
  const verify = program.command("verify").description("Verify chained commitment proofs");

  verify
    .command("membership <segments...>")
    .description("Verify that a value is committed at the path under the root")
    .requiredOption("--proof <file>", "chained proof JSON file")
    .requiredOption("--root <hex>", "trusted root hash (hex)")
    .requiredOption("--value <value>", "expected value")
    .option("--value-encoding <encoding>", "how --value is read: utf8|hex (default: config)")
    .option("--prefix <prefix>", "store prefix (default: config defaultPrefix)")
    .option("--no-prefix", "ignore the configured default prefix")
    .action((segments: string[], cmdOpts: MembershipOptions) => {
      const formatter = createFormatter(program.opts());
      const { verifier, proof, root, path } = loadInputs(formatter, segments, cmdOpts);

      const encoding = cmdOpts.valueEncoding ?? loadConfig().valueEncoding;
      if (!isValueEncoding(encoding)) {
        formatter.error(`Unknown value encoding "${encoding}" (expected utf8|hex)`);
        throw new CliFailure();
      }
      const value = decodeValue(cmdOpts.value, encoding);

      report(formatter, "membership", path, verifier.verifyMembership(proof, root, path, value));
    });

  verify
    .command("non-membership <segments...>")
    .description("Verify that nothing is committed at the path under the root")
    .requiredOption("--proof <file>", "chained proof JSON file")
    .requiredOption("--root <hex>", "trusted root hash (hex)")
    .option("--prefix <prefix>", "store prefix (default: config defaultPrefix)")
    .option("--no-prefix", "ignore the configured default prefix")
    .action((segments: string[], cmdOpts: VerifyOptions) => {
      const formatter = createFormatter(program.opts());
      const { verifier, proof, root, path } = loadInputs(formatter, segments, cmdOpts);

      report(formatter, "non-membership", path, verifier.verifyNonMembership(proof, root, path));
    });
}
