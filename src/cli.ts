#!/usr/bin/env node
import * as readline from 'readline';
import { GoalChain } from './chain/goal-chain';
import { createProductOrderGraph, generateVerificationCode } from './examples/product-order';
import { LLMService } from './services/llm.service';
import type { ChainResponse } from './types/graph';

function render(response: ChainResponse): string {
  return response.type === 'message' ? response.content : JSON.stringify(response.content, null, 2);
}

async function initCLI() {
  const { productOrder } = createProductOrderGraph({
    // No mail in the demo: show the code instead
    sendVerificationCode: (email) => {
      const code = generateVerificationCode();
      console.log(`\n[verification code for ${email}: ${code}]\n`);
      return code;
    },
  });
  const chain = new GoalChain(productOrder, { completion: new LLMService() });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\ngoal-chain demo: product orders\n');
  console.log('Type your message or "exit" to quit\n');
  console.log(`Assistant: ${render(await chain.getResponse())}\n`);

  const askQuestion = () => {
    rl.question('You: ', async (input) => {
      const message = input.trim();

      if (message.toLowerCase() === 'exit') {
        rl.close();
        return;
      }

      try {
        const response = await chain.getResponse(message);
        console.log(`\nAssistant [${response.goal.label}]: ${render(response)}\n`);

        if (response.type === 'message' && response.end) {
          const farewell = await chain.simulateResponse('Thank you for choosing our service. Have a great day!', true);
          console.log(`Assistant: ${farewell.content}\n`);
          rl.close();
          return;
        }
      } catch (error) {
        console.error('\nError:', error instanceof Error ? error.message : String(error), '\n');
      }

      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch(console.error);
}
