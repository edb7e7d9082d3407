import { Address, BlockNumber, PairCreated, Price, Reserves, TransactionHash } from "@chainstream/client/core"

export const PAIR_A = Address.make("0xa478c2975ab1ea89e8196811f51a7b7ade33eb11")
export const PAIR_B = Address.make("0xb4e16d0168e52d35cacd2c6185b44281ec28c9dc")
export const FACTORY = Address.make("0x5c69bee701ef814a2b6a3edd4b1652cb9cc5aa6f")
export const TOKEN_0 = Address.make("0x6b175474e89094c44da98b954eedeac495271d0f")
export const TOKEN_1 = Address.make("0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2")
export const SENDER = Address.make("0x1111111111111111111111111111111111111111")
export const RECEIVER = Address.make("0x2222222222222222222222222222222222222222")

export const HASH = TransactionHash.make(`0x${"ab".repeat(32)}`)

export interface At {
  readonly block: number
  readonly tx?: number
  readonly log?: number
}

const position = ({ block, log = 0, tx = 0 }: At) => ({
  blockNumber: BlockNumber.make(block),
  transactionIndex: tx,
  logIndex: log,
  timestamp: 1_700_000_000 + block * 12,
  transactionHash: HASH
})

export const price = (at: At, pair: Address = PAIR_A): Price =>
  Price.make({
    ...position(at),
    pair,
    sender: SENDER,
    receiver: RECEIVER,
    price: 1850.25,
    volume0: 2.5,
    volume1: 4625.625,
    fixed0: 2_500_000_000_000_000_000n,
    fixed1: 4_625_625_000n,
    decimals0: 18,
    decimals1: 6,
    side: "Buy"
  })

export const pairCreated = (at: At, pair: Address = PAIR_A): PairCreated =>
  PairCreated.make({
    ...position(at),
    factory: FACTORY,
    pair,
    token0: TOKEN_0,
    token1: TOKEN_1,
    pairIndex: 42n
  })

export const reserves = (at: At, pair: Address = PAIR_A, protocolFee?: bigint): Reserves =>
  Reserves.make({
    ...position(at),
    pair,
    type: "Swap",
    reserve0: (1n << 100n) + 7n,
    reserve1: 123_456_789n,
    amount0: (1n << 200n) + 1n,
    amount1: 0n,
    lpAmount: 5n,
    ...(protocolFee === undefined ? {} : { protocolFee })
  })
