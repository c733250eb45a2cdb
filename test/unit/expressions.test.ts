import { expect } from "chai";
import {
  ExpressionContext,
  interpolate,
  parseCondition,
  shouldRun,
} from "../../src/core/pipeline/expressions";
import { ConfigError } from "../../src/types/errors";

const ctx: ExpressionContext = {
  matrix: { "python-version": "3.8", shard: 2 },
  env: { NO_PYSCF: "1" },
  inputs: { versionName: "5.5.0" },
};

describe("interpolate", () => {
  it("substitutes matrix, env and input values", () => {
    expect(
      interpolate(
        "py${{ matrix.python-version }} shard ${{matrix.shard}} pyscf=${{ env.NO_PYSCF }}",
        ctx,
      ),
    ).to.equal("py3.8 shard 2 pyscf=1");
    expect(interpolate("git checkout -b release/v${{ inputs.versionName }}", ctx)).to.equal(
      "git checkout -b release/v5.5.0",
    );
  });

  it("accepts the dispatch-event spelling of inputs", () => {
    expect(
      interpolate("v${{ github.event.inputs.versionName }}", ctx),
    ).to.equal("v5.5.0");
  });

  it("leaves text without expressions alone", () => {
    expect(interpolate("echo $HOME ${PATH}", ctx)).to.equal("echo $HOME ${PATH}");
  });

  it("rejects unknown values and scopes", () => {
    expect(() => interpolate("${{ matrix.os }}", ctx)).to.throw(
      ConfigError,
      'Unknown matrix value "os"',
    );
    expect(() => interpolate("${{ secrets.TOKEN }}", ctx)).to.throw(
      ConfigError,
      "Unsupported expression",
    );
    expect(() => interpolate("${{ matrix }}", ctx)).to.throw(
      ConfigError,
      "Unsupported expression",
    );
  });
});

describe("parseCondition", () => {
  it("defaults to success", () => {
    expect(parseCondition(undefined)).to.equal("success");
  });

  it("accepts bare and wrapped status functions", () => {
    expect(parseCondition("always()")).to.equal("always");
    expect(parseCondition("${{ failure() }}")).to.equal("failure");
    expect(parseCondition(" success() ")).to.equal("success");
  });

  it("rejects other expressions", () => {
    expect(() => parseCondition("github.ref == 'main'")).to.throw(
      ConfigError,
      "Unsupported condition",
    );
    expect(() => parseCondition("cancelled()")).to.throw(ConfigError);
  });
});

describe("shouldRun", () => {
  it("gates steps on the job state", () => {
    expect(shouldRun("success", false)).to.equal(true);
    expect(shouldRun("success", true)).to.equal(false);
    expect(shouldRun("always", true)).to.equal(true);
    expect(shouldRun("failure", false)).to.equal(false);
    expect(shouldRun("failure", true)).to.equal(true);
  });
});
