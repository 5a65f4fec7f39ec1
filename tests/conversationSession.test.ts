import { createAttachment } from '../src/lib/attachments'
import { BackendProtocolError, BackendUnavailableError, UnknownRoleError } from '../src/lib/errors'
import { LocalInferenceBackend, type InferenceChat } from '../src/lib/localInference'
import { RoleCatalog, createDefaultRoleCatalog } from '../src/lib/roles'
import { ConversationSession } from '../src/state/conversationSession'
import type { SessionAction } from '../src/state/sessionStore'
import { ScriptedBackend, silentLogger } from './helpers/fakeBackend'
import { nextTick } from './helpers/streams'

const roles = createDefaultRoleCatalog()

const setup = (roleId: string) => {
  const backend = new ScriptedBackend()
  const logger = silentLogger()
  const session = new ConversationSession({ backend, roles, initialRoleId: roleId, logger })
  return { backend, logger, session }
}

const transcript = (session: ConversationSession) => session.getState().turns.map(t => `${t.author}:${t.text}`)

describe('ConversationSession', () => {
  describe('chat role', () => {
    test('sends system prompt and full history with the new message', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('hello').enqueue('fine, thanks')
      await session.send('hi')
      await session.send('how are you?')

      expect(backend.chatRequests[1].messages).toEqual([
        { role: 'system', content: roles.roleById('chat').systemPrompt },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'how are you?' },
      ])
      expect(backend.chatRequests[1]).toMatchObject({
        model: 'qwen3:32b-fp16',
        sampling: { temperature: 0.6, topP: 0.9, numCtx: 32768 },
      })
      expect(transcript(session)).toEqual(['user:hi', 'assistant:hello', 'user:how are you?', 'assistant:fine, thanks'])
      expect(backend.generateRequests).toHaveLength(0)
    })

    test('reveals reasoning with markers', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('a<think>b', 'c</think>d')
      await session.send('q')
      expect(transcript(session)).toEqual(['user:q', 'assistant:a💭bc💭d'])
    })

    test('a second send cancels the first stream', async () => {
      const { backend, logger, session } = setup('chat')
      backend.enqueue('partial', 'hold').enqueue('second answer')
      const first = session.send('one')
      const second = session.send('two')
      await Promise.all([first, second])

      expect(backend.chatRequests[0].signal?.aborted).toBe(true)
      expect(backend.chatRequests[1].signal?.aborted).toBe(false)
      expect(transcript(session)).toEqual(['user:one', 'assistant:', 'user:two', 'assistant:second answer'])
      expect(backend.chatRequests[1].messages.map(m => m.content)).toEqual([roles.roleById('chat').systemPrompt, 'one', 'two'])
      expect(session.getState().lastError).toBeUndefined()
      expect(session.isStreaming).toBe(false)
      expect(logger.info).toHaveBeenCalledWith('Request for qwen3:32b-fp16 was cancelled')
    })
  })

  describe('single-turn roles', () => {
    test('translate clears the transcript before each send and uses generate', async () => {
      const { backend, session } = setup('translate')
      backend.enqueue('你好').enqueue('苹果')
      await session.send('hello')
      await session.send('apple')

      expect(transcript(session)).toEqual(['user:apple', 'assistant:苹果'])
      expect(backend.generateRequests[1]).toMatchObject({
        model: 'gemma3:4b-it-qat',
        prompt: 'apple',
        system: roles.roleById('translate').systemPrompt,
        images: [],
        sampling: { temperature: 0.3, topP: 0.6 },
      })
      expect(backend.chatRequests).toHaveLength(0)
    })

    test('fix grammar keeps earlier turns visible but sends only the new text', async () => {
      const { backend, session } = setup('fixGrammar')
      backend.enqueue('A.').enqueue('B.')
      await session.send('a')
      await session.send('b')

      expect(transcript(session)).toEqual(['user:a', 'assistant:A.', 'user:b', 'assistant:B.'])
      expect(backend.generateRequests[1]).toMatchObject({ prompt: 'b', system: roles.roleById('fixGrammar').systemPrompt })
    })

    test('hide reasoning, including tags split across fragments', async () => {
      const { backend, session } = setup('translate')
      backend.enqueue('The ', '<thi', 'nk>reasoning', '</think> answer')
      await session.send('q')
      expect(session.getState().turns[1].text).toBe('The  answer')
    })
  })

  test('publishes each filtered fragment as its own update', async () => {
    const { backend, session } = setup('translate')
    backend.enqueue('a', '<think>hidden</think>', 'b')
    const appended: string[] = []
    session.subscribe((_state, action: SessionAction) => {
      if (action.type === 'appendText') appended.push(action.text)
    })
    await session.send('q')
    expect(appended).toEqual(['a', 'b'])
  })

  test('ignores empty and whitespace-only input', async () => {
    const { backend, session } = setup('chat')
    await session.send('')
    await session.send('   \n')
    expect(session.getState().turns).toHaveLength(0)
    expect(backend.chatRequests).toHaveLength(0)
  })

  describe('failures', () => {
    test('removes the empty placeholder when the backend is unavailable', async () => {
      const { backend, logger, session } = setup('translate')
      backend.enqueue(new BackendUnavailableError('Cannot reach backend'))
      await session.send('apple')

      expect(transcript(session)).toEqual(['user:apple'])
      expect(session.getState().lastError).toBe('Failed to send message: Cannot reach backend')
      expect(session.isStreaming).toBe(false)
      expect(logger.error).toHaveBeenCalledTimes(1)
    })

    test('keeps partial output when the stream breaks', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('half an ', new BackendProtocolError('Malformed record in response stream'))
      await session.send('q')
      expect(transcript(session)).toEqual(['user:q', 'assistant:half an '])
      expect(session.getState().lastError).toBe('Failed to send message: Malformed record in response stream')
    })

    test('clears the previous error on the next send and on acknowledgement', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue(new BackendUnavailableError('down')).enqueue('up again')
      await session.send('one')
      expect(session.getState().lastError).toBe('Failed to send message: down')
      await session.send('two')
      expect(session.getState().lastError).toBeUndefined()

      backend.enqueue(new BackendUnavailableError('down'))
      await session.send('three')
      session.acknowledgeError()
      expect(session.getState().lastError).toBeUndefined()
    })
  })

  describe('cancelCurrent', () => {
    test('stops silently and keeps partial text', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('partial', 'hold', 'never shown')
      const sending = session.send('q')
      await nextTick()
      expect(session.isStreaming).toBe(true)
      session.cancelCurrent()
      await sending

      expect(transcript(session)).toEqual(['user:q', 'assistant:partial'])
      expect(session.getState().lastError).toBeUndefined()
      expect(session.isStreaming).toBe(false)
    })

    test('is a no-op when nothing is in flight', () => {
      const { session } = setup('chat')
      expect(() => session.cancelCurrent()).not.toThrow()
    })
  })

  describe('roles and models', () => {
    test('switching role clears the transcript and selects the role default model', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('hello')
      await session.send('hi')
      session.setModel('llama3:8b')
      session.setRole('translate')

      expect(session.getState().turns).toEqual([])
      expect(session.getState().modelId).toBe('gemma3:4b-it-qat')
      expect(session.activeRole.id).toBe('translate')
    })

    test('switching role cancels the in-flight request', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('partial', 'hold')
      const sending = session.send('q')
      await nextTick()
      session.setRole('fixGrammar')
      await sending
      expect(backend.chatRequests[0].signal?.aborted).toBe(true)
      expect(session.getState().turns).toEqual([])
      expect(session.getState().lastError).toBeUndefined()
    })

    test('re-selecting the active role keeps the transcript', async () => {
      const { backend, session } = setup('chat')
      backend.enqueue('hello')
      await session.send('hi')
      session.setRole('chat')
      expect(session.getState().turns).toHaveLength(2)
    })

    test('starts on translate when no initial role is given', () => {
      const session = new ConversationSession({ backend: new ScriptedBackend(), roles, logger: silentLogger() })
      expect(session.activeRole.id).toBe('translate')
      expect(session.getState().modelId).toBe('gemma3:4b-it-qat')
    })

    test('starts on the first role of a catalog without translate', () => {
      const custom = new RoleCatalog([
        { id: 'echo', displayName: 'Echo', systemPrompt: '', defaultModelId: 'tiny', usesMultiTurnChat: false },
        { id: 'other', displayName: 'Other', systemPrompt: '', defaultModelId: 'tiny', usesMultiTurnChat: true },
      ])
      const session = new ConversationSession({ backend: new ScriptedBackend(), roles: custom, logger: silentLogger() })
      expect(session.activeRole.id).toBe('echo')
    })

    test('rejects unknown roles and blank model ids', () => {
      const { session } = setup('chat')
      expect(() => session.setRole('poet')).toThrow(UnknownRoleError)
      expect(() => session.setModel('  ')).toThrow()
      expect(session.getState().modelId).toBe('qwen3:32b-fp16')
    })

    test('uses the selected model for the next request', async () => {
      const { backend, session } = setup('fixGrammar')
      backend.enqueue('Fixed.')
      session.setModel('mistral:7b')
      await session.send('fix this')
      expect(backend.generateRequests[0].model).toBe('mistral:7b')
    })

    test('refreshModels replaces a model the server no longer has', async () => {
      const { backend, session } = setup('translate')
      backend.models = ['llama3:latest', 'phi3:mini']
      await session.refreshModels()
      expect(session.getState().availableModels).toEqual(['llama3:latest', 'phi3:mini'])
      expect(session.getState().modelId).toBe('llama3:latest')
    })

    test('refreshModels reports failures through lastError', async () => {
      const { backend, session } = setup('translate')
      backend.models = new BackendUnavailableError('connection refused')
      await session.refreshModels()
      expect(session.getState().lastError).toBe('Failed to load models: connection refused')
      expect(session.getState().modelId).toBe('gemma3:4b-it-qat')
    })
  })

  describe('attachments', () => {
    test('sends pending images with the message and then clears them', async () => {
      const { backend, logger, session } = setup('chat')
      backend.enqueue('a cat')
      const pic = createAttachment('cat.png', new Uint8Array([1, 2, 3]))
      session.attach(pic)
      await session.send('what is this?')

      const last = backend.chatRequests[0].messages[backend.chatRequests[0].messages.length - 1]
      expect(last).toEqual({ role: 'user', content: 'what is this?', images: ['AQID'] })
      expect(session.getState().turns[0].attachments).toEqual([pic])
      expect(session.getState().pendingAttachments).toEqual([])
      expect(logger.warn).toHaveBeenCalledWith('Model qwen3:32b-fp16 may not accept images; sending 1 anyway')
    })

    test('passes explicit attachments to generate without touching the pending selection', async () => {
      const { backend, session } = setup('translate')
      backend.enqueue('ok')
      const pending = createAttachment('later.png', new Uint8Array([9]))
      session.attach(pending)
      await session.send('read this', [createAttachment('sign.png', new Uint8Array([1, 2, 3]))])
      expect(backend.generateRequests[0].images).toEqual(['AQID'])
      // translate clears the transcript, which drops the pending selection too
      expect(session.getState().pendingAttachments).toEqual([])
    })

    test('detach removes a pending attachment', () => {
      const { session } = setup('chat')
      const a = createAttachment('a.png', new Uint8Array([1]))
      const b = createAttachment('b.png', new Uint8Array([2]))
      session.attach(a, b)
      session.detach(a.id)
      expect(session.getState().pendingAttachments).toEqual([b])
    })

    test('refuses to send more attachments than allowed', async () => {
      const { backend, session } = setup('chat')
      const many = Array.from({ length: 6 }, (_, i) => createAttachment(`${i}.png`, new Uint8Array([i])))
      await session.send('look', many)
      expect(backend.chatRequests).toHaveLength(0)
      expect(session.getState().turns).toHaveLength(0)
      expect(session.getState().lastError).toBe('At most 5 attachments per message')
    })
  })

  test('clear empties the transcript and resets backend state', async () => {
    const { backend, session } = setup('chat')
    backend.enqueue('hello')
    await session.send('hi')
    session.clear()
    expect(session.getState().turns).toEqual([])
    expect(backend.resets).toBe(1)
  })

  describe('with the in-process backend', () => {
    const localSetup = () => {
      const loaded: string[] = []
      const prompts: string[][] = []
      const backend = new LocalInferenceBackend({
        load: async modelId => {
          loaded.push(modelId)
          return {
            createChat: (): InferenceChat => {
              const seen: string[] = []
              prompts.push(seen)
              return {
                async *streamResponse(prompt: string) {
                  seen.push(prompt)
                  yield `${modelId}:${prompt}`
                },
              }
            },
          }
        },
      })
      const session = new ConversationSession({ backend, roles, initialRoleId: 'chat', logger: silentLogger() })
      return { loaded, prompts, session }
    }

    test('keeps one engine chat across sends until cleared', async () => {
      const { loaded, prompts, session } = localSetup()
      await session.send('one')
      await session.send('two')
      session.clear()
      await session.send('three')

      expect(loaded).toEqual(['qwen3:32b-fp16'])
      expect(prompts).toEqual([['one', 'two'], ['three']])
      expect(transcript(session)).toEqual(['user:three', 'assistant:qwen3:32b-fp16:three'])
    })

    test('answers with the model selected after the first send', async () => {
      const { loaded, session } = localSetup()
      await session.send('p')
      session.setModel('big')
      await session.send('q')

      expect(loaded).toEqual(['qwen3:32b-fp16', 'big'])
      expect(session.getState().turns[3].text).toBe('big:q')
    })
  })
})
