import { Address } from "../address/address";
import { type Builder, type Writable, beginCell } from "../cell/builder";
import { Cell } from "../cell/cell";
import { Op } from "./op-codes";
import { type TOutAction, type TStateInit, type TTransferMessage } from "./types";

export function storeStateInit(init: TStateInit): Writable {
  return (builder) => {
    builder
      .storeBit(0) // split_depth
      .storeBit(0) // special
      .storeMaybeRef(init.code)
      .storeMaybeRef(init.data)
      .storeBit(0); // library
  };
}

export function stateInitToCell(init: TStateInit): Cell {
  return beginCell().store(storeStateInit(init)).endCell();
}

export function contractAddress(workchain: number, init: TStateInit): Address {
  return new Address(workchain, stateInitToCell(init).hash());
}

/**
 * Places the state init and the body inline when they fit into the rest of
 * the message cell, otherwise behind refs.
 */
function storeInitAndBody(
  builder: Builder,
  init: TStateInit | undefined,
  body: Cell,
) {
  if (init) {
    const initCell = beginCell().store(storeStateInit(init));
    // two flag bits: init present, init as ref
    const initAsRef = builder.availableBits - 2 < initCell.bits + body.bits.length;
    builder.storeBit(1);
    if (initAsRef) {
      builder.storeBit(1).storeRef(initCell);
    } else {
      builder.storeBit(0).storeBuilder(initCell);
    }
  } else {
    builder.storeBit(0);
  }

  const bodyAsRef =
    body.isExotic ||
    builder.availableBits - 1 < body.bits.length ||
    builder.refs + body.refs.length > 4;
  if (bodyAsRef) {
    builder.storeBit(1).storeRef(body);
  } else {
    builder.storeBit(0).storeSlice(body.beginParse());
  }
}

/** Relaxed internal message as a wallet sends it: no source, no fees, no lt. */
export function storeInternalMessage(message: TTransferMessage): Writable {
  return (builder) => {
    builder
      .storeBit(0) // int_msg_info$0
      .storeBit(1) // ihr_disabled
      .storeBit(message.bounce ?? true)
      .storeBit(0) // bounced
      .storeAddress(null)
      .storeAddress(message.to)
      .storeCoins(message.value)
      .storeBit(0) // extra currencies
      .storeCoins(0) // ihr_fee
      .storeCoins(0) // fwd_fee
      .storeUint(0, 64) // created_lt
      .storeUint(0, 32); // created_at
    storeInitAndBody(builder, message.init, message.body ?? Cell.EMPTY);
  };
}

export function internalMessageToCell(message: TTransferMessage): Cell {
  return beginCell().store(storeInternalMessage(message)).endCell();
}

export type TExternalMessage = {
  to: Address;
  body: Cell;
  init?: TStateInit;
};

export function storeExternalMessage(message: TExternalMessage): Writable {
  return (builder) => {
    builder
      .storeUint(0b10, 2) // ext_in_msg_info$10
      .storeAddress(null)
      .storeAddress(message.to)
      .storeCoins(0); // import_fee
    storeInitAndBody(builder, message.init, message.body);
  };
}

export function externalMessageToCell(message: TExternalMessage): Cell {
  return beginCell().store(storeExternalMessage(message)).endCell();
}

/** `out_list` chain: each action refers to the list of the actions before it. */
export function storeOutList(actions: readonly TOutAction[]): Cell {
  return actions.reduce(
    (prev, action) =>
      beginCell()
        .storeRef(prev)
        .storeUint(Op.outActionSendMsg, 32)
        .storeUint(action.mode, 8)
        .storeRef(action.message)
        .endCell(),
    Cell.EMPTY,
  );
}
