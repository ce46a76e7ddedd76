import type { FlashMessage } from '@magic-chef/shared';

interface FlashMessagesProps {
  messages: readonly FlashMessage[];
}

export function FlashMessages({ messages }: FlashMessagesProps): JSX.Element {
  return (
    <>
      {messages.map((flash, index) => (
        <div key={index} className={`flash flash-${flash.level}`} role="alert">
          {flash.message}
        </div>
      ))}
    </>
  );
}
