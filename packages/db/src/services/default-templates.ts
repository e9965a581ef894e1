import type { MessageTemplateCreate } from "../repository/shared-entities";

export const DEFAULT_MESSAGE_TEMPLATES: readonly MessageTemplateCreate[] = [
  {
    name: "Order Confirmation",
    type: "WhatsApp",
    body:
      "Hello {customer_name}! Your order #{order_id} has been confirmed. Delivery scheduled for {delivery_date}. " +
      "Total: ${total_amount}. Thank you for choosing Island Harvest Hub!"
  },
  {
    name: "Delivery Notification",
    type: "WhatsApp",
    body:
      "Good morning {customer_name}! Your fresh produce order is on its way and will arrive between {delivery_time}. " +
      "Our driver will contact you upon arrival."
  },
  {
    name: "Payment Reminder",
    type: "Email",
    subject: "Payment Reminder - Invoice #{invoice_id}",
    body: [
      "Dear {customer_name},",
      "",
      "This is a friendly reminder that Invoice #{invoice_id} for ${amount} is due on {due_date}.",
      "",
      "Please arrange payment at your earliest convenience.",
      "",
      "Best regards,",
      "Island Harvest Hub"
    ].join("\n")
  },
  {
    name: "Farmer Pickup Schedule",
    type: "WhatsApp",
    body:
      "Hello {farmer_name}! Pickup scheduled for {pickup_date} at {pickup_time}. Please have your {products} ready. " +
      "Expected quantity: {quantity}. See you soon!"
  },
  {
    name: "Quality Feedback",
    type: "WhatsApp",
    body:
      "Hi {farmer_name}, thank you for the excellent {product} delivery! Quality score: {quality_score}/5. " +
      "{feedback_notes}. Keep up the great work!"
  },
  {
    name: "New Customer Welcome",
    type: "Email",
    subject: "Welcome to Island Harvest Hub!",
    body: [
      "Dear {customer_name},",
      "",
      "Welcome to Island Harvest Hub! We're excited to partner with you in bringing the freshest local produce to your establishment.",
      "",
      "Our team is committed to providing you with:",
      "- Premium quality local produce",
      "- Reliable delivery schedules",
      "- Competitive pricing",
      "- Excellent customer service",
      "",
      "Your account is now set up and ready to use. Feel free to contact us anytime.",
      "",
      "Best regards,",
      "Island Harvest Hub"
    ].join("\n")
  }
];
