/**
 * Lowering of structured implementation bodies to blocks
 *
 * Statements are appended to an open block until something transfers
 * control. Blocks without a label of their own are named `anon<n>`, with a
 * counter shared by the whole program. Conditionals become
 * `anon<n>_Then`/`anon<n>_Else`, loops `anon<n>_LoopHead`,
 * `anon<n>_LoopBody` and `anon<n>_LoopDone`; both continue in a fresh
 * block after the statement.
 */

import * as Ast from "#ast";

import { Error as ParseError, ErrorCode, ErrorMessages } from "./errors.js";

export interface Lowered {
  program: Ast.Program;
  errors: ParseError[];
}

export function lowerProgram(program: Ast.Program): Lowered {
  const lowering = new Lowering();
  const declarations = program.declarations.map((declaration) =>
    declaration.kind === "implementation" && declaration.body
      ? Ast.Node.update(declaration, {
          blocks: lowering.lower(declaration.body),
        })
      : declaration,
  );
  return {
    program: Ast.Node.update(program, { declarations }),
    errors: lowering.errors,
  };
}

// A statement that `break` can leave
interface Enclosing {
  label: string | null;
  exit: string;
  loop: boolean;
}

interface OpenBlock {
  label: string;
  commands: Ast.Command[];
  loc: Ast.SourceLocation | null;
}

const nowhere: Ast.SourceLocation = { offset: 0, length: 0 };

class Lowering {
  readonly errors: ParseError[] = [];
  private counter = 0;
  private blocks: Ast.Block[] = [];
  private open: OpenBlock | null = null;

  lower(statements: readonly Ast.Statement[]): Ast.Block[] {
    this.blocks = [];
    this.open = null;

    this.statements(statements, []);
    if (this.open || this.blocks.length === 0) {
      this.close(Ast.Transfer.return_(Ast.nextId()));
    }

    const blocks = this.blocks;
    this.checkLabels(blocks);
    return blocks;
  }

  private statements(
    statements: readonly Ast.Statement[],
    enclosing: readonly Enclosing[],
  ): void {
    statements.forEach((statement, i) => {
      const previous = statements[i - 1];
      const label = previous?.kind === "label" ? previous.label : null;

      switch (statement.kind) {
        case "command":
          this.ensureOpen(statement.loc).commands.push(statement.command);
          return;
        case "label":
          this.startBlock(statement.label, statement.loc);
          return;
        case "if":
          this.if_(statement, label, enclosing);
          return;
        case "while":
          this.while_(statement, label, enclosing);
          return;
        case "break":
          this.break_(statement, enclosing);
          return;
        case "goto":
          this.close(
            Ast.Transfer.goto(
              Ast.nextId(),
              [...statement.labels],
              statement.loc ?? undefined,
            ),
          );
          return;
        case "return":
          this.close(
            Ast.Transfer.return_(Ast.nextId(), statement.loc ?? undefined),
          );
          return;
      }
    });
  }

  private if_(
    statement: Ast.Statement.If,
    label: string | null,
    enclosing: readonly Enclosing[],
  ): void {
    const base = this.fresh();
    const join = this.fresh();
    const inner = [...enclosing, { label, exit: join, loop: false }];
    const location = statement.loc ?? undefined;

    this.ensureOpen(statement.loc);
    this.close(
      Ast.Transfer.goto(
        Ast.nextId(),
        [`${base}_Then`, `${base}_Else`],
        location,
      ),
    );

    this.startBlock(`${base}_Then`, statement.loc);
    if (statement.guard) {
      this.assume(statement.guard);
    }
    this.statements(statement.consequent, inner);
    this.jumpTo(join);

    this.startBlock(`${base}_Else`, statement.loc);
    if (statement.guard) {
      this.assume(negation(statement.guard));
    }
    this.statements(statement.alternative ?? [], inner);
    this.jumpTo(join);

    this.startBlock(join, statement.loc);
  }

  private while_(
    statement: Ast.Statement.While,
    label: string | null,
    enclosing: readonly Enclosing[],
  ): void {
    const base = this.fresh();
    const join = this.fresh();
    const head = `${base}_LoopHead`;
    const body = `${base}_LoopBody`;
    const done = `${base}_LoopDone`;
    const location = statement.loc ?? undefined;

    // the head never is the entry block
    this.ensureOpen(statement.loc);
    this.startBlock(head, statement.loc);
    const open = this.ensureOpen(statement.loc);
    for (const invariant of statement.invariants) {
      open.commands.push(
        invariant.free
          ? Ast.Command.assume(
              Ast.nextId(),
              invariant.condition,
              invariant.attributes,
              invariant.condition.loc ?? undefined,
            )
          : Ast.Command.assert(
              Ast.nextId(),
              invariant.condition,
              invariant.attributes,
              invariant.condition.loc ?? undefined,
            ),
      );
    }
    this.close(Ast.Transfer.goto(Ast.nextId(), [done, body], location));

    this.startBlock(body, statement.loc);
    if (statement.guard) {
      this.assume(statement.guard);
    }
    this.statements(statement.body, [
      ...enclosing,
      { label, exit: join, loop: true },
    ]);
    this.jumpTo(head);

    this.startBlock(done, statement.loc);
    if (statement.guard) {
      this.assume(negation(statement.guard));
    }
    this.jumpTo(join);

    this.startBlock(join, statement.loc);
  }

  private break_(
    statement: Ast.Statement.Break,
    enclosing: readonly Enclosing[],
  ): void {
    const candidates = [...enclosing].reverse();
    const target =
      statement.label === null
        ? candidates.find(({ loop }) => loop)
        : candidates.find(({ label }) => label === statement.label);

    if (!target) {
      this.errors.push(
        statement.label === null
          ? new ParseError(
              ErrorMessages.BREAK_OUTSIDE_LOOP(),
              statement.loc ?? nowhere,
              ErrorCode.LOWERING_BREAK_OUTSIDE_LOOP,
            )
          : new ParseError(
              ErrorMessages.BREAK_LABEL(statement.label),
              statement.loc ?? nowhere,
              ErrorCode.LOWERING_BREAK_LABEL,
            ),
      );
      this.close(Ast.Transfer.return_(Ast.nextId()));
      return;
    }
    this.close(
      Ast.Transfer.goto(
        Ast.nextId(),
        [target.exit],
        statement.loc ?? undefined,
      ),
    );
  }

  private checkLabels(blocks: readonly Ast.Block[]): void {
    const labels = new Set<string>();
    for (const block of blocks) {
      if (labels.has(block.label)) {
        this.errors.push(
          new ParseError(
            ErrorMessages.DUPLICATE_LABEL(block.label),
            block.loc ?? nowhere,
            ErrorCode.LOWERING_DUPLICATE_LABEL,
          ),
        );
      }
      labels.add(block.label);
    }

    for (const { transfer } of blocks) {
      if (transfer.kind !== "goto") {
        continue;
      }
      for (const label of transfer.labels) {
        if (!labels.has(label)) {
          this.errors.push(
            new ParseError(
              ErrorMessages.UNKNOWN_LABEL(label),
              transfer.loc ?? nowhere,
              ErrorCode.LOWERING_UNKNOWN_LABEL,
            ),
          );
        }
      }
    }
  }

  // Block construction

  private fresh(): string {
    return `anon${this.counter++}`;
  }

  private ensureOpen(loc: Ast.SourceLocation | null): OpenBlock {
    if (!this.open) {
      this.open = { label: this.fresh(), commands: [], loc };
    }
    return this.open;
  }

  /**
   * Open a block named `label`, falling through from the open block
   */
  private startBlock(label: string, loc: Ast.SourceLocation | null): void {
    this.jumpTo(label);
    this.open = { label, commands: [], loc };
  }

  private jumpTo(label: string): void {
    if (this.open) {
      this.close(Ast.Transfer.goto(Ast.nextId(), [label]));
    }
  }

  private close(transfer: Ast.Transfer): void {
    const { label, commands, loc } = this.ensureOpen(transfer.loc);
    this.blocks.push(
      Ast.block(Ast.nextId(), label, commands, transfer, loc ?? undefined),
    );
    this.open = null;
  }

  private assume(condition: Ast.Expression): void {
    this.ensureOpen(condition.loc).commands.push(
      Ast.Command.assume(
        Ast.nextId(),
        condition,
        new Map(),
        condition.loc ?? undefined,
      ),
    );
  }
}

function negation(guard: Ast.Expression): Ast.Expression.Unary {
  return Ast.Expression.unary(
    Ast.nextId(),
    "!",
    Ast.Node.clone(guard),
    guard.loc ?? undefined,
  );
}
