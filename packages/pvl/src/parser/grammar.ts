/**
 * Concrete syntax of PVL, as an ohm grammar
 */

import * as ohm from "ohm-js";

export const grammarSource = String.raw`
Pvl {
  Program = Declaration*

  Declaration
    = TypeDecl
    | ConstDecl
    | VarDecl
    | FunctionDecl
    | AxiomDecl
    | ProcedureDecl
    | ImplementationDecl

  TypeDecl = kw<"type"> Attribute* ident ident* TypeBody? ";"
  TypeBody = "=" Type

  ConstDecl = kw<"const"> Attribute* kw<"unique">? IdsType ConstParents? ";"
  ConstParents = kw<"extends"> ListOf<ConstParent, ","> kw<"complete">?
  ConstParent = kw<"unique">? ident

  VarDecl = kw<"var"> Attribute* NonemptyListOf<IdsTypeWhere, ","> ";"

  FunctionDecl = kw<"function"> Attribute* ident TypeParams? "(" ListOf<IdType, ","> ")" FunctionResult FunctionBody
  FunctionResult
    = kw<"returns"> "(" IdType ")"  -- named
    | kw<"returns"> "(" Type ")"  -- anonymous
    | ":" Type  -- type
  FunctionBody
    = "{" Expr "}"  -- defined
    | ";"  -- declared

  AxiomDecl = kw<"axiom"> Attribute* Expr ";"

  ProcedureDecl = kw<"procedure"> Attribute* ident Signature ";" Spec*
  Signature = TypeParams? "(" ListOf<IdsTypeWhere, ","> ")" Returns?
  Returns = kw<"returns"> "(" ListOf<IdsTypeWhere, ","> ")"
  Spec
    = kw<"free">? kw<"requires"> Attribute* Expr ";"  -- requires
    | kw<"free">? kw<"ensures"> Attribute* Expr ";"  -- ensures
    | kw<"modifies"> ListOf<ident, ","> ";"  -- modifies

  ImplementationDecl = kw<"implementation"> Attribute* ident Signature "{" LocalDecl* Statement* "}"
  LocalDecl = kw<"var"> Attribute* NonemptyListOf<IdsTypeWhere, ","> ";"

  IdType = ident ":" Type
  IdsType = NonemptyListOf<ident, ","> ":" Type
  IdsTypeWhere = IdsType WhereClause?
  WhereClause = kw<"where"> Expr
  TypeParams = "<" NonemptyListOf<ident, ","> ">"

  Attribute = "{:" ident ListOf<AttributeParam, ","> "}"
  AttributeParam
    = stringLiteral  -- string
    | Expr  -- expression

  // Statements

  Statement
    = ident colon  -- label
    | kw<"assert"> Attribute* Expr ";"  -- assert
    | kw<"assume"> Attribute* Expr ";"  -- assume
    | kw<"havoc"> NonemptyListOf<ident, ","> ";"  -- havoc
    | kw<"call"> Attribute* CallOutputs? ident "(" ListOf<Expr, ","> ")" ";"  -- call
    | IfStatement
    | kw<"while"> "(" Guard ")" Invariant* "{" Statement* "}"  -- while
    | kw<"break"> ident? ";"  -- break
    | kw<"goto"> NonemptyListOf<ident, ","> ";"  -- goto
    | kw<"return"> ";"  -- return
    | NonemptyListOf<Target, ","> ":=" NonemptyListOf<Expr, ","> ";"  -- assign

  CallOutputs = NonemptyListOf<ident, ","> ":="
  IfStatement = kw<"if"> "(" Guard ")" "{" Statement* "}" ElseClause?
  ElseClause
    = kw<"else"> IfStatement  -- if
    | kw<"else"> "{" Statement* "}"  -- block
  Guard
    = "*"  -- star
    | Expr
  Invariant = kw<"free">? kw<"invariant"> Attribute* Expr ";"
  Target = ident TargetIndex*
  TargetIndex = "[" NonemptyListOf<Expr, ","> "]"

  // Expressions, loosest binding first

  Expr
    = kw<"if"> Expr kw<"then"> Expr kw<"else"> Expr  -- conditional
    | EquivExpr
  EquivExpr = ImpliesExpr ("<==>" ImpliesExpr)*
  ImpliesExpr
    = LogicalExpr "==>" ImpliesExpr  -- implies
    | LogicalExpr
  LogicalExpr
    = RelExpr ("&&" RelExpr)+  -- and
    | RelExpr ("||" RelExpr)+  -- or
    | RelExpr
  RelExpr
    = ConcatExpr relOp ConcatExpr  -- binary
    | ConcatExpr
  ConcatExpr = AddExpr ("++" AddExpr)*
  AddExpr = MulExpr (addOp MulExpr)*
  MulExpr = UnaryExpr (mulOp UnaryExpr)*
  UnaryExpr
    = "!" UnaryExpr  -- not
    | "-" UnaryExpr  -- neg
    | CoercionExpr
  CoercionExpr = PostfixExpr (colon Type)*
  PostfixExpr
    = PostfixExpr "[" nat ":" nat "]"  -- extract
    | PostfixExpr "[" NonemptyListOf<Expr, ","> ":=" Expr "]"  -- store
    | PostfixExpr "[" ListOf<Expr, ","> "]"  -- select
    | AtomExpr
  AtomExpr
    = "(" Quantifier ")"  -- quantifier
    | "(" Expr ")"  -- paren
    | kw<"old"> "(" Expr ")"  -- old
    | kw<"true">  -- true
    | kw<"false">  -- false
    | bvLiteral  -- bitvector
    | nat  -- integer
    | ident "(" ListOf<Expr, ","> ")"  -- call
    | ident  -- variable
  Quantifier = quantifierKind TypeParams? NonemptyListOf<IdsType, ","> "::" QuantifierAnnotation* Expr
  QuantifierAnnotation
    = Attribute
    | "{" NonemptyListOf<Expr, ","> "}"  -- trigger

  // Types

  Type
    = MapType
    | TypeAtom
    | ident TypeArgument*  -- application
  TypeArgument
    = TypeAtom
    | MapType
    | ident  -- name
  TypeAtom
    = kw<"int">  -- int
    | kw<"bool">  -- bool
    | bvType  -- bitvector
    | "(" Type ")"  -- paren
  MapType = TypeParams? "[" ListOf<Type, ","> "]" Type

  // Lexical rules

  relOp = "==" ~">" | "!=" | "<:" | "<=" ~"=>" | "<" ~"==>" | ">=" | ">"
  addOp = "+" ~"+" | "-"
  mulOp = "*" | kw<"div"> | kw<"mod">
  colon = ":" ~(":" | "=")
  quantifierKind = kw<"forall"> | kw<"exists">

  ident = ~keyword ~bvType identStart identRest*
  identStart = letter | "_" | "$" | "." | "'" | "?" | "#"
  identRest = identStart | digit

  keyword
    = kw<"type"> | kw<"const"> | kw<"unique"> | kw<"extends"> | kw<"complete">
    | kw<"var"> | kw<"where"> | kw<"function"> | kw<"returns"> | kw<"axiom">
    | kw<"procedure"> | kw<"implementation"> | kw<"free"> | kw<"requires">
    | kw<"ensures"> | kw<"modifies"> | kw<"assert"> | kw<"assume">
    | kw<"havoc"> | kw<"call"> | kw<"if"> | kw<"then"> | kw<"else">
    | kw<"while"> | kw<"invariant"> | kw<"break"> | kw<"goto">
    | kw<"return"> | kw<"old"> | kw<"forall"> | kw<"exists"> | kw<"true">
    | kw<"false"> | kw<"int"> | kw<"bool"> | kw<"div"> | kw<"mod">
  kw<word> = word ~identRest

  bvType = "bv" digit+ ~identRest
  bvLiteral = digit+ "bv" digit+ ~identRest
  nat = digit+ ~identRest
  stringLiteral = "\"" (~"\"" ~"\n" any)* "\""

  space += comment
  comment
    = "//" (~"\n" any)*  -- line
    | "/*" (~"*/" any)* "*/"  -- block
}
`;

export const grammar: ohm.Grammar = ohm.grammar(grammarSource);
