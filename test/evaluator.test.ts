import { describe, test, expect, vi } from 'vitest';
import { rm } from 'node:fs/promises';
import { evaluateInscriptions, publishInscriptions } from '../ts-scripts/inscriptions/evaluator';
import { FUND_AMOUNT, PAYLOAD_SIZES } from '../ts-scripts/utils/constants';
import { InscriptionTestUtils } from './utils';

describe('Inscriptions evaluator', async () => {

  function setup() {
    const chain = new InscriptionTestUtils.FakeChain()
    const alice = InscriptionTestUtils.getAlice()
    const lines: string[] = []
    const deps = {
      rest: chain,
      faucet: chain,
      generateAccount: () => alice,
      log: (line: string) => { lines.push(line) },
    }
    return { chain, alice, lines, deps }
  }

  test('Calls the chain in order and reports gas per payload size', async () => {
    const { chain, alice, lines, deps } = setup()

    const reports = await evaluateInscriptions(deps, InscriptionTestUtils.MODULE_ADDRESS, [0, 1024])

    expect(chain.calls).toEqual([
      'fund_account',
      'account_balance',
      'create_collection',
      'wait_for_transaction',
      'mint_token',
      'wait_for_transaction',
      'transaction_by_hash',
      'mint_token',
      'wait_for_transaction',
      'transaction_by_hash',
    ])
    expect(reports.map(r => [r.size, r.gasUsed])).toEqual([[0, 500n], [1024, 1524n]])
    expect(reports.map(r => r.hash)).toEqual([chain.submitted[1].hash, chain.submitted[2].hash])
    expect(lines).toEqual([
      `alice ${alice.accountAddress.toString()} balance ${FUND_AMOUNT}`,
      '0 -- 500',
      '1024 -- 1524',
    ])
  })

  test('Mints into the demo collection as the funded account', async () => {
    const { chain, alice, deps } = setup()

    await evaluateInscriptions(deps, InscriptionTestUtils.MODULE_ADDRESS, [3])

    const [create, mint] = chain.submitted
    expect(create.data.functionArguments).toEqual([
      'Behold the power of Inscriptions on Aptos',
      100,
      'Immutable Inscriptions Demo',
      0,
      1,
      alice.accountAddress.toString(),
      '',
    ])
    expect(mint.sender.equals(alice.accountAddress)).toBe(true)
    expect(mint.data.functionArguments).toEqual([
      'Immutable Inscriptions Demo',
      new Uint8Array(3),
      'Nyan, a cat for the next generation',
      'Nyan',
      'https://aptos.dev/img/nyan.jpeg',
    ])
  })

  test('Uses the default payload sizes', async () => {
    const { deps } = setup()

    const reports = await evaluateInscriptions(deps, InscriptionTestUtils.MODULE_ADDRESS)

    expect(reports.map(r => r.size)).toEqual(PAYLOAD_SIZES)
    expect(reports.map(r => r.gasUsed)).toEqual([500n, 1524n, 10740n, 51700n, 63988n])
  })

  test('Stops at the first failed mint', async () => {
    const { chain, lines, deps } = setup()
    chain.aborting.add('mint_token')

    await expect(evaluateInscriptions(deps, InscriptionTestUtils.MODULE_ADDRESS, [0, 1024]))
      .rejects.toThrow('failed: Move abort')

    expect(chain.calls.slice(-2)).toEqual(['mint_token', 'wait_for_transaction'])
    expect(chain.submitted).toHaveLength(2)
    expect(lines).toHaveLength(1)
  })

  test('Publishes the package under a fresh funded account', async () => {
    const { chain, alice, deps } = setup()
    const dir = await InscriptionTestUtils.writePackage('Inscriptions', {
      manifest: InscriptionTestUtils.manifest('Inscriptions'),
      metadata: Uint8Array.of(1, 2),
      modules: { 'inscriptions.mv': Uint8Array.of(3), 'events.mv': Uint8Array.of(4) },
    })
    const run = vi.fn(async (_file: string, _args: string[]) => { })

    try {
      const address = await publishInscriptions({ ...deps, publishOptions: { cli: 'aptos-test', run } }, dir)

      expect(address.equals(alice.accountAddress)).toBe(true)
      expect(run).toHaveBeenCalledWith('aptos-test', [
        'move',
        'compile',
        '--save-metadata',
        '--package-dir',
        dir,
        '--named-addresses',
        `inscriptions=${alice.accountAddress.toString()}`,
      ])
      expect(chain.calls).toEqual(['fund_account', 'publish_package', 'wait_for_transaction'])
      expect(chain.published[0].metadata).toEqual(Uint8Array.of(1, 2))
      expect(chain.published[0].modules).toEqual([Uint8Array.of(4), Uint8Array.of(3)])
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
