/**
 * Loop extraction
 *
 * Every loop of an implementation becomes a procedure `loop_h`, named after
 * the header block h, whose parameters are copies of all variables of the
 * implementation. The implementation calls `loop_h` on entering the header
 * and gives up at the end of each iteration; the implementation of `loop_h`
 * runs one iteration on copies of the loop blocks and calls itself where
 * the iteration would go back to the header.
 *
 * Inner loops are extracted first, so the copies made for an outer loop
 * call the procedures of the loops nested in it.
 */

import * as Ast from "#ast";
import { invariant } from "#errors";
import { Result } from "#result";
import { Resolution } from "#resolver";
import { Type } from "#types";

import { Error as CfgError, ErrorCode, ErrorMessages } from "./errors.js";
import { buildGraph, type Graph } from "./graph.js";
import { computeLoops, loopBlocks, type Loops } from "./loops.js";

const ENTRY = "entry";
const EXIT = "exit";

export function extractLoops(
  program: Ast.Program,
  resolution: Resolution,
): Result<Ast.Program, CfgError> {
  const callables = new Set(
    program.declarations.flatMap((declaration) =>
      declaration.kind === "function" || declaration.kind === "procedure"
        ? [declaration.name]
        : [],
    ),
  );

  const errors: CfgError[] = [];
  const declarations: Ast.Declaration[] = [];
  const extracted: Ast.Declaration[] = [];

  for (const declaration of program.declarations) {
    if (
      declaration.kind !== "implementation" ||
      declaration.blocks.length === 0
    ) {
      declarations.push(declaration);
      continue;
    }

    const extraction = new LoopExtraction(declaration, resolution);
    const clashes = extraction.clashes(callables);
    if (clashes.length > 0) {
      errors.push(...clashes);
      declarations.push(declaration);
      continue;
    }

    const { implementation, loops } = extraction.run();
    declarations.push(implementation);
    for (const loop of loops) {
      if (loop.kind === "procedure") {
        callables.add(loop.name);
      }
      extracted.push(loop);
    }
  }

  return Result.fromMessages(
    extracted.length === 0
      ? program
      : Ast.Node.update(program, {
          declarations: [...declarations, ...extracted],
        }),
    errors,
  );
}

export function loopProcedureName(header: Ast.Block): string {
  return `loop_${header.label}`;
}

class LoopExtraction {
  private readonly graph: Graph;
  private readonly loops: Loops;
  private readonly loopBlocks = new Map<Ast.Block, Ast.Block[]>();

  // the latest version of every block of the implementation
  private readonly current = new Map<Ast.Block, Ast.Block>();
  private readonly dummies: Ast.Block[] = [];

  // how the copies inside loop procedures refer to each variable
  private readonly renaming = new Map<Ast.Declaration.Variable, string>();
  // variables denoted by identifiers created here, which resolution has
  // never seen
  private readonly origins = new Map<Ast.Id, Ast.Declaration.Variable>();

  constructor(
    private readonly implementation: Ast.Declaration.Implementation,
    private readonly resolution: Resolution,
  ) {
    this.graph = buildGraph(implementation.blocks);
    this.loops = computeLoops(this.graph);
    invariant(
      this.loops.reducible,
      "Irreducible flow graphs are unsupported.",
      implementation.loc ?? undefined,
    );

    for (const block of implementation.blocks) {
      this.current.set(block, block);
    }
    for (const header of this.loops.headers) {
      this.loopBlocks.set(header, loopBlocks(this.graph, this.loops, header));
    }
    for (const variable of this.ins) {
      this.renaming.set(variable, `in_${variable.name}`);
    }
    for (const variable of this.outs) {
      this.renaming.set(variable, `out_${variable.name}`);
    }
  }

  // in-parameters
  private get ins(): Ast.Declaration.Variable[] {
    return this.implementation.parameters;
  }

  // out-parameters and locals, which loop procedures hand back
  private get outs(): Ast.Declaration.Variable[] {
    return [...this.implementation.returns, ...this.implementation.locals];
  }

  /**
   * Names the extraction would need that are already taken
   */
  clashes(callables: ReadonlySet<string>): CfgError[] {
    const errors: CfgError[] = [];
    const labels = new Set(this.implementation.blocks.map(({ label }) => label));

    for (const header of this.loops.headers) {
      const name = loopProcedureName(header);
      if (callables.has(name)) {
        errors.push(
          new CfgError(
            ErrorMessages.LOOP_NAME_CLASH(name),
            header.loc ?? undefined,
            ErrorCode.LOOP_NAME_CLASH,
          ),
        );
      }

      const reserved = [
        ...this.blocksOf(header)
          .map(({ label }) => label)
          .filter((label) => label === ENTRY || label === EXIT),
        ...(this.loops.backEdges.get(header) ?? [])
          .map(dummyLabel)
          .filter((label) => labels.has(label)),
      ];
      for (const label of new Set(reserved)) {
        errors.push(
          new CfgError(
            ErrorMessages.LABEL_CLASH(label, this.implementation.name),
            this.implementation.loc ?? undefined,
            ErrorCode.LABEL_CLASH,
          ),
        );
      }
    }
    return errors;
  }

  run(): {
    implementation: Ast.Declaration.Implementation;
    loops: Ast.Declaration[];
  } {
    const headers = [...this.loops.headers].sort(
      (a, b) => this.blocksOf(a).length - this.blocksOf(b).length,
    );
    const loops = headers.flatMap((header) => this.extract(header));

    return {
      implementation: Ast.Node.update(this.implementation, {
        body: null,
        blocks: [
          ...this.implementation.blocks.map((block) => this.currentOf(block)),
          ...this.dummies,
        ],
      }),
      loops,
    };
  }

  private extract(header: Ast.Block): Ast.Declaration[] {
    const name = loopProcedureName(header);
    const blocks = this.blocksOf(header);

    const procedure = Ast.Declaration.procedure(
      Ast.nextId(),
      name,
      { typeParameters: this.freshTypeParameters(), ...this.signature() },
      { modifies: this.modifiedGlobals(blocks) },
    );

    // going back to the header ends the iteration
    const recursion: Ast.Block[] = [];
    for (const source of this.loops.backEdges.get(header) ?? []) {
      const label = dummyLabel(source);
      this.breakBackEdge(source, header, label);
      recursion.push(
        Ast.block(
          Ast.nextId(),
          label,
          [this.recursiveCall(name)],
          Ast.Transfer.return_(Ast.nextId()),
        ),
      );
    }

    const inLoop = new Set([
      ...blocks.map(({ label }) => label),
      ...recursion.map(({ label }) => label),
    ]);
    const copies = blocks.map((block) =>
      this.copy(this.currentOf(block), inLoop),
    );

    const entry = Ast.block(
      Ast.nextId(),
      ENTRY,
      this.initialAssignments(),
      Ast.Transfer.goto(Ast.nextId(), [header.label, EXIT]),
    );
    const exit = Ast.block(
      Ast.nextId(),
      EXIT,
      [],
      Ast.Transfer.return_(Ast.nextId()),
    );

    const implementation = Ast.Declaration.implementation(
      Ast.nextId(),
      name,
      { typeParameters: this.freshTypeParameters(), ...this.signature() },
      { blocks: [entry, ...copies, ...recursion, exit] },
    );

    this.prependCall(header, name);
    return [procedure, implementation];
  }

  // each declaration binds its own variables; formal types refer to them
  // by name
  private freshTypeParameters(): Type.Variable[] {
    return this.implementation.typeParameters.map(
      ({ name }) => new Type.Variable(name),
    );
  }

  private blocksOf(header: Ast.Block): Ast.Block[] {
    return this.loopBlocks.get(header) ?? [];
  }

  private currentOf(block: Ast.Block): Ast.Block {
    const current = this.current.get(block);
    invariant(current, `block ${block.label} is not in ${this.implementation.name}`);
    return current;
  }

  private signature(): {
    parameters: Ast.Declaration.Formal[];
    returns: Ast.Declaration.Formal[];
  } {
    const formal = (
      variable: Ast.Declaration.Variable,
      prefix: string,
      incoming: boolean,
    ) =>
      Ast.Declaration.formal(
        Ast.nextId(),
        `${prefix}${variable.name}`,
        variable.declaredType,
        incoming,
      );
    return {
      parameters: [...this.ins, ...this.outs].map((variable) =>
        formal(variable, "in_", true),
      ),
      returns: this.outs.map((variable) => formal(variable, "out_", false)),
    };
  }

  /**
   * Globals assigned in `blocks`, directly or by the procedures they call
   */
  private modifiedGlobals(
    blocks: readonly Ast.Block[],
  ): Ast.Expression.Identifier[] {
    const globals: Ast.Declaration.Variable[] = [];
    const add = (identifier: Ast.Expression.Identifier) => {
      const variable = Resolution.variableOf(this.resolution, identifier);
      if (variable.kind === "global" && !globals.includes(variable)) {
        globals.push(variable);
      }
    };

    for (const block of blocks) {
      for (const command of block.commands) {
        switch (command.kind) {
          case "assign":
            command.targets.map(Ast.Target.variableOf).forEach(add);
            break;
          case "havoc":
            command.variables.forEach(add);
            break;
          case "call":
            command.outputs.forEach(add);
            Resolution.procedureOf(this.resolution, command).modifies.forEach(
              add,
            );
            break;
          case "assert":
          case "assume":
            break;
        }
      }
    }

    return globals.map((global) =>
      Ast.Expression.identifier(Ast.nextId(), global.name),
    );
  }

  private breakBackEdge(
    source: Ast.Block,
    header: Ast.Block,
    label: string,
  ): void {
    const block = this.currentOf(source);
    const { transfer } = block;
    invariant(
      transfer.kind === "goto",
      `back edge source ${source.label} does not end in a goto`,
    );

    const labels = transfer.labels.filter((target) => target !== header.label);
    if (!labels.includes(label)) {
      labels.push(label);
    }
    this.current.set(
      source,
      Ast.Node.update(block, {
        transfer: Ast.Node.update(transfer, { labels }),
      }),
    );

    if (!this.dummies.some((dummy) => dummy.label === label)) {
      this.dummies.push(
        Ast.block(
          Ast.nextId(),
          label,
          [assumeFalse()],
          Ast.Transfer.return_(Ast.nextId()),
        ),
      );
    }
  }

  /**
   * Copy of `block` for a loop procedure: variables renamed, edges out of
   * the loop dropped
   */
  private copy(block: Ast.Block, inLoop: ReadonlySet<string>): Ast.Block {
    const copy = Ast.Node.clone(block, (original) => this.renamed(original));
    const { transfer } = copy;
    if (transfer.kind === "return") {
      return copy;
    }

    const labels = transfer.labels.filter((label) => inLoop.has(label));
    if (labels.length > 0) {
      return Ast.Node.update(copy, {
        transfer: Ast.Node.update(transfer, { labels }),
      });
    }
    return Ast.Node.update(copy, {
      commands: [...copy.commands, assumeFalse()],
      transfer: Ast.Transfer.return_(Ast.nextId()),
    });
  }

  private renamed(original: Ast.Node): Ast.Node | undefined {
    if (original.type !== "IdentifierExpression") {
      return undefined;
    }
    const variable =
      this.resolution.bindings.get(original.id) ??
      this.origins.get(original.id);
    const name =
      variable && Ast.Declaration.isVariable(variable)
        ? this.renaming.get(variable)
        : undefined;
    return name
      ? Ast.Expression.identifier(
          Ast.nextId(),
          name,
          original.loc ?? undefined,
        )
      : undefined;
  }

  private identifierFor(
    variable: Ast.Declaration.Variable,
  ): Ast.Expression.Identifier {
    const identifier = Ast.Expression.identifier(Ast.nextId(), variable.name);
    this.origins.set(identifier.id, variable);
    return identifier;
  }

  /**
   * `call outs := loop_h(ins, outs)` at the start of the header
   */
  private prependCall(header: Ast.Block, name: string): void {
    const call = Ast.Command.call(
      Ast.nextId(),
      name,
      [...this.ins, ...this.outs].map((variable) => this.identifierFor(variable)),
      this.outs.map((variable) => this.identifierFor(variable)),
    );
    const block = this.currentOf(header);
    this.current.set(
      header,
      Ast.Node.update(block, { commands: [call, ...block.commands] }),
    );
  }

  private recursiveCall(name: string): Ast.Command.Call {
    const identifier = (prefix: string, variable: Ast.Declaration.Variable) =>
      Ast.Expression.identifier(Ast.nextId(), `${prefix}${variable.name}`);
    return Ast.Command.call(
      Ast.nextId(),
      name,
      [
        ...this.ins.map((variable) => identifier("in_", variable)),
        ...this.outs.map((variable) => identifier("out_", variable)),
      ],
      this.outs.map((variable) => identifier("out_", variable)),
    );
  }

  /**
   * `out_x := in_x` for every variable handed back
   */
  private initialAssignments(): Ast.Command[] {
    if (this.outs.length === 0) {
      return [];
    }
    return [
      Ast.Command.assign(
        Ast.nextId(),
        this.outs.map((variable) =>
          Ast.Target.simple(
            Ast.nextId(),
            Ast.Expression.identifier(Ast.nextId(), `out_${variable.name}`),
          ),
        ),
        this.outs.map((variable) =>
          Ast.Expression.identifier(Ast.nextId(), `in_${variable.name}`),
        ),
      ),
    ];
  }
}

function dummyLabel(source: Ast.Block): string {
  return `${source.label}_dummy`;
}

function assumeFalse(): Ast.Command.Assume {
  return Ast.Command.assume(
    Ast.nextId(),
    Ast.Expression.boolean(Ast.nextId(), false),
  );
}
