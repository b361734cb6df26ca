/**
 * Type tests for stage chains: forwarders and stage factories keep the
 * concrete stage type
 */
import type { Document } from "mongodb";
import { expectType } from "tsd";

import { Builder, Group, Limit, Operator, Project, Sort } from "../../src/index.js";

class TestOperator extends Operator {
  getExpression(): Document {
    return { $test: this.expr.getExpression() };
  }
}

// Test 1: Forwarders return the concrete operator stage
{
  const operator = new TestOperator(new Builder());
  expectType<TestOperator>(operator.add(1, 2).multiply(3, 4));
  expectType<TestOperator>(operator.field("a").switch().case("$flag").default(0));
}

// Test 2: Stage-specific methods stay reachable after forwarded calls
{
  const project = new Builder().project();
  expectType<Project>(project.field("a").abs("$b").includeFields(["c"]));
  expectType<Project>(project.field("d").avg("$x", "$y").excludeIdField());

  const group = new Builder().group();
  expectType<Group>(group.field("_id").expression("$k").field("n").sum(1).addToSet("$v"));
}

// Test 3: invoke keeps the stage type and the expression method's parameters
{
  const project = new Builder().project();
  expectType<Project>(project.invoke("sum", "$d"));
  expectType<Project>(project.invoke("range", 0, 10));
  expectType<Project>(project.switch().case("$flag").invoke("then", "yes"));
}

// Test 4: Stage factories return the stage they add
{
  const group = new Builder().group();
  expectType<Sort>(group.sort("count", -1));
  expectType<Limit>(group.sort("count", -1).limit(1));
}
